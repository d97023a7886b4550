import { IssueSeverity } from '../types/report';
import { createFinding } from './ruleHelpers';
import type { Rule } from './types';

const PRESSURE_CONDITIONS = ['DiskPressure', 'MemoryPressure', 'PIDPressure'];

export const nodeNotReadyRule: Rule<'Node'> = {
  category: 'NodeNotReady',
  kind: 'Node',
  severity: IssueSeverity.CRITICAL,
  evaluate(node, context) {
    const ready = node.conditions.find(c => c.type === 'Ready');
    if (ready?.status === 'True') return [];
    return [
      createFinding(this, node, context, {
        status: ready?.status ?? 'missing',
        detail: ready?.message ?? ''
      })
    ];
  }
};

export const nodeUnschedulableRule: Rule<'Node'> = {
  category: 'NodeUnschedulable',
  kind: 'Node',
  severity: IssueSeverity.WARNING,
  evaluate(node, context) {
    return node.schedulable ? [] : [createFinding(this, node, context, {})];
  }
};

export const nodePressureRule: Rule<'Node'> = {
  category: 'NodePressure',
  kind: 'Node',
  severity: IssueSeverity.WARNING,
  evaluate(node, context) {
    const active = node.conditions.filter(c => PRESSURE_CONDITIONS.includes(c.type) && c.status === 'True');
    if (active.length === 0) return [];
    return [createFinding(this, node, context, { conditions: active.map(c => c.type).join(', ') })];
  }
};

export const nodeRules = [nodeNotReadyRule, nodeUnschedulableRule, nodePressureRule];
