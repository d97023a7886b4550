import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { validateManifest } from '../../src/manifest/manifestValidator';
import { fakeRunner } from '../helpers/fixtures';

const POD_WITH_MISSING_SECRET = `apiVersion: v1
kind: Pod
metadata:
  name: web
spec:
  imagePullSecrets:
    - name: missing-secret
  containers:
    - name: web
      image: registry.example.com/web:1.0
`;

describe('validateManifest', () => {
  let dir: string;
  let manifestPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'k8s-inspector-'));
    manifestPath = join(dir, 'pod.yaml');
    await writeFile(manifestPath, POD_WITH_MISSING_SECRET);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should run a server-side dry-run when kubectl is available', async () => {
    const runner = fakeRunner(true, () => ({ exitCode: 0, output: 'pod/web created (server dry run)\n', timedOut: false }));

    const result = await validateManifest(manifestPath, { runner, namespace: 'prod', timeoutMs: 5_000, allowFallback: true });

    expect(result).toEqual({ status: 'valid', method: 'dry-run', output: 'pod/web created (server dry run)' });
    expect(runner.runs).toEqual([['apply', '--dry-run=server', '-f', manifestPath, '-n', 'prod']]);
  });

  it('should classify a manifest rejected by the server as invalid', async () => {
    const rejection = 'Error from server (Invalid): Pod "web" is invalid: spec.imagePullSecrets[0].name: Not found: "missing-secret"\n';
    const runner = fakeRunner(true, () => ({ exitCode: 1, output: rejection, timedOut: false }));

    const result = await validateManifest(manifestPath, { runner, timeoutMs: 5_000, allowFallback: true });

    expect(result).toEqual({
      status: 'invalid',
      method: 'dry-run',
      reasons: ['Error from server (Invalid): Pod "web" is invalid: spec.imagePullSecrets[0].name: Not found: "missing-secret"']
    });
  });

  it('should report unknown when the dry-run times out', async () => {
    const runner = fakeRunner(true, () => ({ exitCode: undefined, output: '', timedOut: true }));

    const result = await validateManifest(manifestPath, { runner, timeoutMs: 5_000, allowFallback: true });

    expect(result).toEqual({ status: 'unknown', reason: 'kubectl dry-run timed out after 5000ms' });
  });

  it('should accept the same manifest under the shallow fallback', async () => {
    const runner = fakeRunner(false);

    const result = await validateManifest(manifestPath, { runner, timeoutMs: 5_000, allowFallback: true });

    expect(result).toEqual({ status: 'valid', method: 'shallow', output: 'Basic YAML checks passed.' });
    expect(runner.runs).toEqual([]);
  });

  it('should report the shallow problems of a malformed manifest', async () => {
    const brokenPath = join(dir, 'broken.yaml');
    await writeFile(brokenPath, 'apiVersion: v1\nmetadata:\n  name: web\n');

    const result = await validateManifest(brokenPath, { runner: fakeRunner(false), timeoutMs: 5_000, allowFallback: true });

    expect(result).toEqual({ status: 'invalid', method: 'shallow', reasons: ["Document 0 missing 'kind'"] });
  });

  it('should report unknown without kubectl when the fallback is disabled', async () => {
    const result = await validateManifest(manifestPath, { runner: fakeRunner(false), timeoutMs: 5_000, allowFallback: false });

    expect(result).toEqual({ status: 'unknown', reason: 'kubectl is not available for a server-side dry-run' });
  });

  it('should report an unreadable manifest the same way on both paths', async () => {
    const missingPath = join(dir, 'missing.yaml');
    const withKubectl = fakeRunner(true, () => ({ exitCode: 0, output: '', timedOut: false }));

    const dryRun = await validateManifest(missingPath, { runner: withKubectl, timeoutMs: 5_000, allowFallback: true });
    const shallow = await validateManifest(missingPath, { runner: fakeRunner(false), timeoutMs: 5_000, allowFallback: true });

    expect(dryRun.status).toBe('invalid');
    expect(shallow.status).toBe('invalid');
    expect(dryRun).toEqual({ ...shallow, method: 'dry-run' });
    expect(withKubectl.runs).toEqual([]);
  });
});
