/**
 * Check command - load and register a hierarchy file
 *
 * Reports the first problem found (unknown parent, duplicate method,
 * default for an undeclared method, inheritance cycle) with a suggestion.
 */

import { Command } from 'commander';
import { loadHierarchy, type HierarchyDescriptor, type Logger } from '@polybridge/core';
import { openBridge, withHierarchy } from '../utils/hierarchy.js';
import { handleCommandError } from '../utils/errorFormatter.js';

interface CheckOptions {
  project: string;
}

export interface CheckSummary {
  classes: number;
  methods: number;
  defaults: number;
  roots: string[];
}

export function checkHierarchy(hierarchy: readonly HierarchyDescriptor[], logger?: Logger): CheckSummary {
  const bridge = openBridge(hierarchy, logger);
  try {
    const nodes = bridge.classes();
    return {
      classes: nodes.length,
      methods: nodes.reduce((sum, node) => sum + node.methods.size, 0),
      defaults: nodes.reduce((sum, node) => sum + node.defaults.size, 0),
      roots: nodes.filter(node => node.parent === null).map(node => node.name),
    };
  } finally {
    bridge.dispose();
  }
}

export function formatCheck(summary: CheckSummary, filePath: string): string {
  return [
    `✓ ${filePath}`,
    `  classes:  ${summary.classes}`,
    `  methods:  ${summary.methods}`,
    `  defaults: ${summary.defaults}`,
    `  roots:    ${summary.roots.join(', ') || '(none)'}`,
  ].join('\n');
}

export const checkCommand = new Command('check')
  .description('Validate a hierarchy file by registering it')
  .argument('[file]', 'Hierarchy file (defaults to the one in .polybridge/config.yaml)')
  .option('-p, --project <path>', 'Project path', '.')
  .action(async (file: string | undefined, options: CheckOptions) => {
    try {
      await withHierarchy(file, options.project, ({ filePath, logger }) => {
        console.log(formatCheck(checkHierarchy(loadHierarchy(filePath), logger), filePath));
      });
    } catch (err) {
      handleCommandError(err);
    }
  });
