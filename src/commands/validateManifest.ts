import type { Command } from 'commander';

import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import type { ValidateManifestResult } from '@/commands/types.js';
import { ManifestError, loadManifestFile } from '@/manifest/index.js';
import { formatManifestSummary, summarizeManifest } from '@/ui/formatters/index.js';
import { joinLines } from '@/ui/formatting.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

function formatValidation(data: ValidateManifestResult): string {
  if (data.summary !== undefined) {
    return joinLines(`${data.file} is valid`, '', formatManifestSummary(data.summary));
  }
  return joinLines(
    `${data.file} is invalid: ${data.error ?? 'unknown error'}`,
    data.field !== undefined && `  at ${data.field}`
  );
}

/**
 * Register validate-manifest command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerValidateManifestCommand(program: Command): void {
  program
    .command('validate-manifest')
    .description('Load a manifest and report whether it is consistent')
    .argument('<file>', 'Path to a JSON manifest')
    .addOption(jsonOption)
    .action(async (file: string, options: BaseCommandOptions) => {
      await runCommand<BaseCommandOptions, ValidateManifestResult>(
        async () => {
          try {
            const manifest = await loadManifestFile(file);
            return {
              success: true,
              data: { file, valid: true, summary: summarizeManifest(manifest) },
            };
          } catch (error) {
            if (!(error instanceof ManifestError)) {
              throw error;
            }
            return {
              success: false,
              data: {
                file,
                valid: false,
                error: error.details ?? error.message,
                ...(error.data?.field !== undefined && { field: error.data.field }),
              },
              exitCode: EXIT_CODES.INVALID_MANIFEST,
            };
          }
        },
        options,
        formatValidation
      );
    });
}
