import type { ValidationMethod, ValidationResult } from '../manifest/manifestValidator';
import type { DataNotice } from '../types/k8s';
import { IssueSeverity, type Finding, type Report, type ResourceRef } from '../types/report';

const HEALTHY_SUMMARY = 'No issues detected. Cluster looks healthy (based on checks performed).';

export function formatRef(ref: ResourceRef): string {
  return ref.namespace ? `${ref.kind} ${ref.namespace}/${ref.name}` : `${ref.kind} ${ref.name}`;
}

function formatFinding(finding: Finding): string {
  return [
    `### ${finding.category}: ${formatRef(finding.resource)}`,
    finding.message,
    `**Suggestion:** ${finding.suggestion}`
  ].join('\n');
}

function formatNotices(notices: readonly DataNotice[]): string[] {
  if (notices.length === 0) return [];
  const lines = ['', '## Partial Data', ''];
  notices.forEach(n => {
    lines.push(`- ${n.kind} listing failed, its checks were skipped: ${n.reason}`);
  });
  return lines;
}

export function summarize(findings: readonly Finding[]): string {
  if (findings.length === 0) return HEALTHY_SUMMARY;
  const count = (severity: IssueSeverity) => findings.filter(f => f.severity === severity).length;
  return `${count(IssueSeverity.CRITICAL)} critical, ${count(IssueSeverity.WARNING)} warning, ${count(IssueSeverity.INFO)} info`;
}

export function formatReport(report: Report): string {
  const lines: string[] = [];

  const scope = report.scope.namespace ? `namespace ${report.scope.namespace}` : 'all namespaces';
  lines.push(`# Cluster Inspection: ${scope}`);
  lines.push('');
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push('');
  lines.push(`**Summary:** ${summarize(report.findings)}`);
  lines.push('');
  lines.push('---');

  lines.push(...formatNotices(report.notices));

  const severitySections: { severity: IssueSeverity; title: string }[] = [
    { severity: IssueSeverity.CRITICAL, title: 'Critical Issues' },
    { severity: IssueSeverity.WARNING, title: 'Warnings' },
    { severity: IssueSeverity.INFO, title: 'Info' }
  ];

  for (const { severity, title } of severitySections) {
    const findings = report.findings.filter(f => f.severity === severity);
    if (findings.length > 0) {
      lines.push('', `## ${title}`, '');
      findings.forEach(finding => {
        lines.push(formatFinding(finding), '');
      });
    }
  }

  return lines.join('\n');
}

function methodLabel(method: ValidationMethod): string {
  return method === 'dry-run' ? 'server-side dry-run' : 'shallow checks only';
}

export function formatValidation(manifestPath: string, result: ValidationResult): string {
  const lines = [`## Manifest Validation: ${manifestPath}`, ''];

  switch (result.status) {
    case 'valid':
      lines.push(`**Result:** valid (${methodLabel(result.method)})`);
      if (result.output) lines.push('', result.output);
      if (result.method === 'shallow') {
        lines.push('', 'Shallow checks do not catch semantic errors; the API server may still reject this manifest.');
      }
      break;
    case 'invalid':
      lines.push(`**Result:** invalid (${methodLabel(result.method)})`, '');
      result.reasons.forEach(reason => {
        lines.push(`- ${reason}`);
      });
      break;
    case 'unknown':
      lines.push(`**Result:** unknown (${result.reason})`);
      break;
  }

  return lines.join('\n');
}

export interface JsonOutput {
  report?: Report | undefined;
  validation?: (ValidationResult & { manifest: string }) | undefined;
  apply?: { ok: boolean; output: string } | undefined;
  error?: { code: string; message: string } | undefined;
}

export function formatJson(output: JsonOutput): string {
  return JSON.stringify(output, null, 2);
}
