import type { DataNotice, ResourceKind, ScanScope } from './k8s';

export enum IssueSeverity {
  CRITICAL = 'critical',
  WARNING = 'warning',
  INFO = 'info'
}

export interface ResourceRef {
  kind: ResourceKind;
  name: string;
  namespace?: string | undefined;
}

export interface Finding {
  readonly resource: ResourceRef;
  readonly severity: IssueSeverity;
  readonly category: string;
  readonly message: string;
  readonly suggestion: string;
  // Object an event finding is about
  readonly relatedTo?: ResourceRef | undefined;
}

export interface Report {
  readonly generatedAt: string;
  readonly scope: ScanScope;
  readonly findings: readonly Finding[];
  readonly notices: readonly DataNotice[];
}
