/**
 * cmdtree validate — Check module manifest files without loading them
 */

import { Command } from 'commander';
import { ModuleValidator, parseManifestFile } from '@cmdtree/module-loader';
import { t } from '../tui/theme.js';

export interface ManifestReport {
  readonly file: string;
  readonly ok: boolean;
  readonly messages: ReadonlyArray<string>;
}

export function validateManifestFiles(files: ReadonlyArray<string>): ManifestReport[] {
  const validator = new ModuleValidator();
  return files.map((file) => {
    const parsed = parseManifestFile(file);
    if (!parsed.ok) return { file, ok: false, messages: [parsed.details] };
    const result = validator.validateManifest(parsed.value);
    if (result.ok) return { file, ok: true, messages: [] };
    return {
      file,
      ok: false,
      messages: result.errors.map((e) => (e.context !== undefined ? `${e.context}: ${e.message}` : e.message)),
    };
  });
}

export const validateCommand = new Command('validate')
  .description('Validate module manifest files')
  .argument('<file...>', 'Manifest files (JSON)')
  .action((files: string[]) => {
    const reports = validateManifestFiles(files);
    for (const report of reports) {
      // eslint-disable-next-line no-console
      console.log((report.ok ? t.green('ok   ') : t.red('FAIL ')) + report.file);
      for (const message of report.messages) {
        // eslint-disable-next-line no-console
        console.log('     ' + t.muted(message));
      }
    }
    if (reports.some((r) => !r.ok)) process.exitCode = 1;
  });
