/**
 * Manifest command - print the API manifest of a hierarchy
 *
 * Usage:
 *   polybridge manifest
 *   polybridge manifest bridge/hierarchy.yaml --format yaml
 */

import { Command } from 'commander';
import { stringify as stringifyYAML } from 'yaml';
import { loadHierarchy, type ApiManifest } from '@polybridge/core';
import { openBridge, withHierarchy } from '../utils/hierarchy.js';
import { exitWithError, handleCommandError } from '../utils/errorFormatter.js';

export type ManifestFormat = 'json' | 'yaml';

interface ManifestOptions {
  project: string;
  format: string;
}

function isManifestFormat(value: string): value is ManifestFormat {
  return value === 'json' || value === 'yaml';
}

export function renderManifest(manifest: ApiManifest, format: ManifestFormat): string {
  return format === 'yaml' ? stringifyYAML(manifest).trimEnd() : JSON.stringify(manifest, null, 2);
}

export const manifestCommand = new Command('manifest')
  .description('Print the classes and overridable methods exposed to the host')
  .argument('[file]', 'Hierarchy file (defaults to the one in .polybridge/config.yaml)')
  .option('-p, --project <path>', 'Project path', '.')
  .option('--format <format>', 'Output format: json or yaml', 'json')
  .action(async (file: string | undefined, options: ManifestOptions) => {
    if (!isManifestFormat(options.format)) {
      exitWithError(`Unknown format "${options.format}"`, ['Use --format json or --format yaml']);
    }
    const format = options.format;

    try {
      await withHierarchy(file, options.project, ({ filePath, logger }) => {
        const bridge = openBridge(loadHierarchy(filePath), logger);
        console.log(renderManifest(bridge.manifest(), format));
        bridge.dispose();
      });
    } catch (err) {
      handleCommandError(err);
    }
  });
