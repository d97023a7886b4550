import yaml from 'js-yaml';
import { z } from 'zod';
import { errorMessage } from '../errors/inspectorErrors';

// Only the keys every object needs; this is not a schema validator
const manifestDocumentSchema = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().min(1),
    metadata: z.object({ name: z.string().min(1) }).passthrough()
  })
  .passthrough();

export interface ShallowCheckResult {
  ok: boolean;
  problems: string[];
}

function describeIssue(index: number, issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `Document ${index} missing '${path}'`;
  }
  return `Document ${index} field '${path}': ${issue.message}`;
}

export function checkManifestShape(text: string): ShallowCheckResult {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(text);
  } catch (error: unknown) {
    return { ok: false, problems: [`YAML parse error: ${errorMessage(error).split('\n')[0]}`] };
  }

  const problems: string[] = [];
  let count = 0;
  documents.forEach((doc, index) => {
    // Empty documents, e.g. a trailing "---"
    if (doc === null || doc === undefined) return;
    count++;
    if (typeof doc !== 'object' || Array.isArray(doc)) {
      problems.push(`Document ${index} is not a mapping`);
      return;
    }
    const parsed = manifestDocumentSchema.safeParse(doc);
    if (!parsed.success) {
      problems.push(...parsed.error.issues.map(issue => describeIssue(index, issue)));
    }
  });

  if (count === 0) problems.push('Manifest contains no documents');
  return { ok: problems.length === 0, problems };
}
