import { describe, it, expect } from 'vitest';
import { evaluateSnapshot } from '../../src/analysis/evaluator';
import { buildRuleTable, defaultRuleTable } from '../../src/rules/ruleTable';
import { crashLoopBackOffRule } from '../../src/rules/podRules';
import type { Rule } from '../../src/rules/types';
import { IssueSeverity } from '../../src/types/report';
import { makeContext, makeEvent, makeNode, makePod, makePvc, makeSnapshot } from '../helpers/fixtures';

describe('evaluator', () => {
  const context = makeContext();

  it('should run every rule against the resources of its kind', () => {
    const snapshot = makeSnapshot({
      pods: [
        makePod({
          restartCount: 9,
          containers: [{ name: 'main', restartCount: 9, waitingReason: 'CrashLoopBackOff' }]
        })
      ],
      nodes: [makeNode({ schedulable: false })],
      events: [makeEvent()]
    });

    const categories = evaluateSnapshot(snapshot, context).map(f => f.category).sort();

    expect(categories).toEqual(['CrashLoopBackOff', 'HighRestartCount', 'NodeUnschedulable', 'WarningEvent']);
  });

  it('should skip a malformed record and keep evaluating the rest', () => {
    const snapshot = makeSnapshot({
      pvcs: [makePvc({ name: 'broken', phase: undefined }), makePvc({ name: 'lost', phase: 'Lost' })],
      nodes: [makeNode({ conditions: [{ type: 'Ready', status: 'False' }] })]
    });

    const findings = evaluateSnapshot(snapshot, context);

    expect(findings.map(f => `${f.category}:${f.resource.name}`).sort()).toEqual(['NodeNotReady:node-1', 'PVCLost:lost']);
  });

  it('should use a custom rule table', () => {
    const snapshot = makeSnapshot({
      pods: [makePod({ restartCount: 20, containers: [{ name: 'main', waitingReason: 'CrashLoopBackOff' }] })]
    });

    const findings = evaluateSnapshot(snapshot, context, buildRuleTable([crashLoopBackOffRule]));

    expect(findings).toHaveLength(1);
    expect(findings[0]!.category).toBe('CrashLoopBackOff');
  });

  it('should propagate errors that are not skips', () => {
    const faulty: Rule<'Node'> = {
      category: 'Faulty',
      kind: 'Node',
      severity: IssueSeverity.INFO,
      evaluate() {
        throw new Error('bug in rule');
      }
    };

    expect(() => evaluateSnapshot(makeSnapshot({ nodes: [makeNode()] }), context, buildRuleTable([faulty]))).toThrow(
      'bug in rule'
    );
  });

  it('should refuse two rules for one category', () => {
    expect(() => buildRuleTable([crashLoopBackOffRule, crashLoopBackOffRule])).toThrow(
      'Duplicate rule for category "CrashLoopBackOff"'
    );
  });

  it('should return nothing for a healthy snapshot', () => {
    const snapshot = makeSnapshot({ pods: [makePod()], nodes: [makeNode()], pvcs: [makePvc()] });

    expect(evaluateSnapshot(snapshot, context, defaultRuleTable)).toEqual([]);
  });
});
