/**
 * Resolve command - show which class supplies a method's native default
 *
 * Usage:
 *   polybridge resolve ExtraDerived do_something
 *   polybridge resolve ExtraDerived do_something -f hierarchy.yaml --json
 */

import { Command } from 'commander';
import { loadHierarchy, type HierarchyDescriptor, type Logger } from '@polybridge/core';
import { openBridge, withHierarchy } from '../utils/hierarchy.js';
import { handleCommandError } from '../utils/errorFormatter.js';

interface ResolveOptions {
  project: string;
  file?: string;
  json?: boolean;
}

export interface ResolutionReport {
  className: string;
  method: string;
  /** Nearest class declaring the method, null if undeclared */
  declaredBy: string | null;
  arity?: number;
  /** Class whose default is used when the host does not override */
  defaultOwner: string | null;
  /** Implementation key of that default */
  implementation: string | null;
}

export function resolveReport(
  hierarchy: readonly HierarchyDescriptor[],
  className: string,
  method: string,
  logger?: Logger
): ResolutionReport {
  const bridge = openBridge(hierarchy, logger);
  try {
    const declaration = bridge.lookupMethod(className, method);
    const resolved = bridge.defaultFor(className, method);
    const owner = resolved ? hierarchy.find(d => d.name === resolved.owner) : undefined;

    const report: ResolutionReport = {
      className,
      method,
      declaredBy: declaration?.owner ?? null,
      defaultOwner: resolved?.owner ?? null,
      implementation: owner?.defaults[method] ?? null,
    };
    if (declaration?.method.arity !== undefined) {
      report.arity = declaration.method.arity;
    }
    return report;
  } finally {
    bridge.dispose();
  }
}

export function formatResolution(report: ResolutionReport): string {
  const target = `${report.className}.${report.method}`;
  if (report.defaultOwner === null) {
    return `${target} -> no native default`;
  }
  return `${target} -> ${report.defaultOwner} (${report.implementation ?? 'unnamed'})`;
}

export const resolveCommand = new Command('resolve')
  .description('Show which class supplies the native default for a virtual method')
  .argument('<class>', 'Class the instance is created as')
  .argument('<method>', 'Virtual method name')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-f, --file <path>', 'Hierarchy file (defaults to the one in .polybridge/config.yaml)')
  .option('-j, --json', 'Output as JSON')
  .addHelpText('after', `
Examples:
  polybridge resolve ExtraDerived do_something       Nearest default along the chain
  polybridge resolve Base do_something --json        Output as JSON for scripting
`)
  .action(async (className: string, method: string, options: ResolveOptions) => {
    let report: ResolutionReport;
    try {
      report = await withHierarchy(options.file, options.project, ({ filePath, logger }) =>
        resolveReport(loadHierarchy(filePath), className, method, logger)
      );
    } catch (err) {
      handleCommandError(err);
    }

    console.log(options.json ? JSON.stringify(report, null, 2) : formatResolution(report));
    if (report.defaultOwner === null) {
      process.exitCode = 1;
    }
  });
