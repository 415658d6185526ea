import type { Manifest } from '@/manifest/index.js';
import { OutputFormatter, pluralize } from '@/ui/formatting.js';

/**
 * Summary of a loaded manifest, suitable for JSON output.
 */
export interface ManifestSummary {
  version: string;
  name?: string;
  models: string[];
  commands: Array<{ name: string; args: string[]; required: string[] }>;
}

export function summarizeManifest(manifest: Manifest): ManifestSummary {
  return {
    version: manifest.version,
    ...(manifest.name !== undefined && { name: manifest.name }),
    models: [...manifest.models.keys()],
    commands: [...manifest.commands.values()].map((command) => {
      const args = [...command.args.entries()];
      return {
        name: command.name,
        args: args.map(([name]) => name),
        required: args.filter(([, spec]) => spec.required).map(([name]) => name),
      };
    }),
  };
}

/**
 * Render a manifest summary as text.
 *
 * @example
 * ```typescript
 * formatManifestSummary(summary);
 * // Manifest 1.0.0 (workspace-service)
 * // 1 command, 0 models
 * //
 * // Commands:
 * //   createWorkspace(name*, template)
 * ```
 */
export function formatManifestSummary(summary: ManifestSummary): string {
  const title =
    summary.name !== undefined
      ? `Manifest ${summary.version} (${summary.name})`
      : `Manifest ${summary.version}`;

  const formatter = new OutputFormatter()
    .text(title)
    .text(
      `${pluralize(summary.commands.length, 'command')}, ${pluralize(summary.models.length, 'model')}`
    );

  if (summary.commands.length > 0) {
    formatter.blank().section(
      'Commands:',
      summary.commands.map((command) => {
        const args = command.args.map((arg) =>
          command.required.includes(arg) ? `${arg}*` : arg
        );
        return `${command.name}(${args.join(', ')})`;
      })
    );
  }
  if (summary.models.length > 0) {
    formatter.blank().section('Models:', summary.models);
  }
  return formatter.build();
}
