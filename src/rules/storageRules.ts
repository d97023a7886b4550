import { IssueSeverity } from '../types/report';
import { createFinding, minutesSince, requireField } from './ruleHelpers';
import type { Rule } from './types';

export const pvcUnboundRule: Rule<'PVC'> = {
  category: 'PVCUnbound',
  kind: 'PVC',
  severity: IssueSeverity.WARNING,
  evaluate(pvc, context) {
    const phase = requireField(pvc.phase, 'status.phase');
    if (phase !== 'Pending') return [];
    const createdAt = requireField(pvc.createdAt, 'metadata.creationTimestamp');
    const minutes = minutesSince(createdAt, context.now);
    if (minutes < context.thresholds.pvcGraceMinutes) return [];
    return [createFinding(this, pvc, context, { minutes, storageClass: pvc.storageClass ?? '(default)' })];
  }
};

export const pvcLostRule: Rule<'PVC'> = {
  category: 'PVCLost',
  kind: 'PVC',
  severity: IssueSeverity.CRITICAL,
  evaluate(pvc, context) {
    return pvc.phase === 'Lost' ? [createFinding(this, pvc, context, {})] : [];
  }
};

export const storageRules = [pvcUnboundRule, pvcLostRule];
