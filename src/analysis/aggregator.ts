import type { ResourceKind } from '../types/k8s';
import { IssueSeverity, type Finding, type ResourceRef } from '../types/report';

const SEVERITY_RANK: Record<IssueSeverity, number> = {
  [IssueSeverity.CRITICAL]: 0,
  [IssueSeverity.WARNING]: 1,
  [IssueSeverity.INFO]: 2
};

const KIND_ORDER: Record<ResourceKind, number> = {
  Pod: 0,
  Node: 1,
  PVC: 2,
  Deployment: 3,
  Event: 4
};

export function refKey(ref: ResourceRef): string {
  return `${ref.kind}/${ref.namespace ?? ''}/${ref.name}`;
}

function findingKey(finding: Finding): string {
  return `${refKey(finding.resource)}#${finding.category}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

// Total order: severity, kind, name, namespace, category
export function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    KIND_ORDER[a.resource.kind] - KIND_ORDER[b.resource.kind] ||
    compareText(a.resource.name, b.resource.name) ||
    compareText(a.resource.namespace ?? '', b.resource.namespace ?? '') ||
    compareText(a.category, b.category)
  );
}

function dedupe(findings: readonly Finding[]): Finding[] {
  const byKey = new Map<string, Finding>();
  for (const finding of findings) {
    const key = findingKey(finding);
    const existing = byKey.get(key);
    if (!existing || SEVERITY_RANK[finding.severity] < SEVERITY_RANK[existing.severity]) {
      byKey.set(key, finding);
    }
  }
  return [...byKey.values()];
}

// Drops event findings about an object a more specific rule already reported
function suppressCoveredEvents(findings: Finding[]): Finding[] {
  const covered = new Set(findings.filter(f => f.resource.kind !== 'Event').map(f => refKey(f.resource)));
  return findings.filter(f => {
    if (f.resource.kind !== 'Event' || !f.relatedTo) return true;
    return !covered.has(refKey(f.relatedTo));
  });
}

export function aggregateFindings(findings: readonly Finding[]): Finding[] {
  return suppressCoveredEvents(dedupe(findings)).sort(compareFindings);
}
