import { describe, it, expect } from 'vitest';
import { nodeNotReadyRule, nodeUnschedulableRule, nodePressureRule } from '../../src/rules/nodeRules';
import { IssueSeverity } from '../../src/types/report';
import { makeContext, makeNode } from '../helpers/fixtures';

describe('nodeRules', () => {
  const context = makeContext();

  describe('nodeNotReadyRule', () => {
    it('should report a node whose Ready status is Unknown', () => {
      const node = makeNode({
        conditions: [{ type: 'Ready', status: 'Unknown', message: 'Kubelet stopped posting node status.' }]
      });

      const findings = nodeNotReadyRule.evaluate(node, context);

      expect(findings).toHaveLength(1);
      expect(findings[0]!.severity).toBe(IssueSeverity.CRITICAL);
      expect(findings[0]!.resource).toEqual({ kind: 'Node', name: 'node-1' });
      expect(findings[0]!.message).toBe('Node Ready condition is Unknown. Kubelet stopped posting node status.');
      expect(findings[0]!.suggestion).toBe(
        'Check the kubelet, network and disk on the node: kubectl describe node node-1, then the kubelet logs on the host.'
      );
    });

    it('should not report a Ready node', () => {
      expect(nodeNotReadyRule.evaluate(makeNode(), context)).toEqual([]);
    });

    it('should report a node without a Ready condition', () => {
      const findings = nodeNotReadyRule.evaluate(makeNode({ conditions: [] }), context);

      expect(findings[0]!.message).toBe('Node Ready condition is missing.');
    });
  });

  describe('nodeUnschedulableRule', () => {
    it('should suggest uncordoning a cordoned node', () => {
      const findings = nodeUnschedulableRule.evaluate(makeNode({ schedulable: false }), context);

      expect(findings).toHaveLength(1);
      expect(findings[0]!.severity).toBe(IssueSeverity.WARNING);
      expect(findings[0]!.suggestion).toBe('If maintenance is finished, uncordon it: kubectl uncordon node-1');
    });

    it('should ignore schedulable nodes', () => {
      expect(nodeUnschedulableRule.evaluate(makeNode(), context)).toEqual([]);
    });
  });

  describe('nodePressureRule', () => {
    it('should list every active pressure condition', () => {
      const node = makeNode({
        conditions: [
          { type: 'Ready', status: 'True' },
          { type: 'DiskPressure', status: 'True' },
          { type: 'MemoryPressure', status: 'True' },
          { type: 'PIDPressure', status: 'False' }
        ]
      });

      const findings = nodePressureRule.evaluate(node, context);

      expect(findings).toHaveLength(1);
      expect(findings[0]!.message).toBe('Node reports DiskPressure, MemoryPressure.');
    });
  });
});
