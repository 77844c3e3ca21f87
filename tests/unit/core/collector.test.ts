import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, symlinkSync } from 'node:fs';
import { join } from 'node:path';
import { collectRecords, listRegistrations } from '../../../src/core/collector.js';
import type { ProbeError } from '../../../src/core/errors.js';
import {
  createSandbox,
  installAndRegister,
  makeInstallation,
  register,
  type Sandbox,
} from '../../helpers.js';

describe('collector', () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  describe('listRegistrations', () => {
    it('returns prefixed symlinks only, sorted', () => {
      const { layout } = sandbox;
      installAndRegister(layout, 'cpython-3.13.2-any', '3.13.2');
      installAndRegister(layout, 'cpython-3.12.7-any', '3.12.7');
      symlinkSync(join(layout.managedRoot, 'cpython-3.12.7-any'), join(layout.versionsDir, 'work-compat'));
      mkdirSync(join(layout.versionsDir, 'uv-plain-directory'));

      expect(listRegistrations(layout)).toEqual(['uv-cpython-3.12.7-any', 'uv-cpython-3.13.2-any']);
    });

    it('returns an empty list for a missing versions directory', () => {
      const layout = { ...sandbox.layout, versionsDir: join(sandbox.root, 'missing') };
      expect(listRegistrations(layout)).toEqual([]);
    });
  });

  describe('collectRecords', () => {
    it('produces one record per probed installation', () => {
      const { layout } = sandbox;
      const dir = installAndRegister(layout, 'cpython-3.12.7-any', '3.12.7');

      expect(collectRecords(layout)).toEqual([
        { version: '3.12.7', installationPath: dir, installationId: 'uv-cpython-3.12.7-any' },
      ]);
    });

    it('resolves relative link targets against the versions directory', () => {
      const { layout } = sandbox;
      const dir = makeInstallation(layout, 'cpython-3.11.9-any', '3.11.9');
      symlinkSync('../managed/cpython-3.11.9-any', join(layout.versionsDir, 'uv-cpython-3.11.9-any'));

      expect(collectRecords(layout)).toEqual([
        { version: '3.11.9', installationPath: dir, installationId: 'uv-cpython-3.11.9-any' },
      ]);
    });

    it('skips dangling registrations and failed probes without failing', () => {
      const { layout } = sandbox;
      installAndRegister(layout, 'cpython-3.12.7-any', '3.12.7');
      register(layout, 'gone', join(layout.managedRoot, 'gone'));
      const empty = join(layout.managedRoot, 'empty');
      mkdirSync(empty);
      register(layout, 'empty', empty);

      const skipped: Array<[string, ProbeError]> = [];
      const records = collectRecords(layout, { onSkip: (id, err) => skipped.push([id, err]) });

      expect(records.map((r) => r.installationId)).toEqual(['uv-cpython-3.12.7-any']);
      expect(skipped.map(([id, err]) => [id, err.code])).toEqual([['uv-empty', 'NoRuntimeFound']]);
    });

    it('honours a custom prefix', () => {
      const layout = { ...sandbox.layout, prefix: 'tc-' };
      installAndRegister(layout, 'cpython-3.12.7-any', '3.12.7');
      installAndRegister(sandbox.layout, 'cpython-3.13.2-any', '3.13.2');

      expect(collectRecords(layout).map((r) => r.installationId)).toEqual(['tc-cpython-3.12.7-any']);
    });
  });
});
