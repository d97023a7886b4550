import type { EventState, ResourceKind } from '../types/k8s';
import { IssueSeverity, type ResourceRef } from '../types/report';
import { createFinding, minutesSince, requireField } from './ruleHelpers';
import type { Rule } from './types';

const INVOLVED_KINDS: Record<string, ResourceKind> = {
  Pod: 'Pod',
  Node: 'Node',
  PersistentVolumeClaim: 'PVC',
  Deployment: 'Deployment'
};

// Maps an event's involved object onto a ref the other rules could have produced
export function involvedRef(event: EventState): ResourceRef | undefined {
  const { kind, name, namespace } = event.involvedObject;
  const mapped = kind ? INVOLVED_KINDS[kind] : undefined;
  if (!mapped || !name) return undefined;
  return {
    kind: mapped,
    name,
    ...(mapped !== 'Node' && { namespace: namespace || event.namespace || 'default' })
  };
}

export const warningEventRule: Rule<'Event'> = {
  category: 'WarningEvent',
  kind: 'Event',
  severity: IssueSeverity.INFO,
  evaluate(event, context) {
    if (event.type !== 'Warning') return [];
    const lastSeen = requireField(event.lastSeen, 'lastTimestamp');
    if (minutesSince(lastSeen, context.now) > context.thresholds.eventWindowMinutes) return [];

    const objectKind = requireField(event.involvedObject.kind, 'involvedObject.kind');
    const objectName = requireField(event.involvedObject.name, 'involvedObject.name');
    const objectNamespace = event.involvedObject.namespace;
    return [
      createFinding(
        this,
        event,
        context,
        {
          objectKind,
          objectName,
          objectKindLower: objectKind.toLowerCase(),
          namespaceFlag: objectNamespace ? `-n ${objectNamespace} ` : '',
          reason: event.reason ?? 'Unknown',
          count: event.count ?? 1,
          detail: event.message ?? ''
        },
        involvedRef(event)
      )
    ];
  }
};

export const eventRules = [warningEventRule];
