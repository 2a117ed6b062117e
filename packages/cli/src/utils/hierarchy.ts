/**
 * Hierarchy helpers shared by CLI commands.
 *
 * A file only names its default implementations, so the CLI binds each key to
 * a stand-in that returns the key itself. That is enough to register the
 * classes and to see which level a default resolves to.
 */

import { resolve, join, isAbsolute } from 'path';
import {
  DispatchBridge,
  FileLogger,
  MultiLogger,
  ObjectHost,
  createLogger,
  loadConfig,
  registerHierarchy,
  type BridgeConfig,
  type HierarchyDescriptor,
  type ImplementationTable,
  type Logger,
  type NativeImpl,
} from '@polybridge/core';

export interface HierarchySource {
  filePath: string;
  config: BridgeConfig;
  logger: Logger;
}

/**
 * Pick the hierarchy file: the explicit argument, else the project config.
 */
export function locateHierarchy(file: string | undefined, projectPath: string): HierarchySource {
  const root = resolve(projectPath);
  const config = loadConfig(root);
  const logFile = config.logFile && !isAbsolute(config.logFile) ? join(root, config.logFile) : config.logFile;
  const logger = createLogger(config.logLevel, { logFile });

  const filePath = file ? resolve(file) : join(root, config.hierarchy);
  return { filePath, config, logger };
}

/**
 * Flush and close any log file behind `logger`.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}

/**
 * Locate the hierarchy file and call `run` with it. The logger is closed
 * once `run` returns or throws, before any error reaches the caller.
 */
export async function withHierarchy<T>(
  file: string | undefined,
  projectPath: string,
  run: (source: HierarchySource) => T
): Promise<T> {
  const source = locateHierarchy(file, projectPath);
  try {
    return run(source);
  } finally {
    await closeLogger(source.logger);
  }
}

export function labelImplementations(hierarchy: readonly HierarchyDescriptor[]): ImplementationTable {
  const impls: Record<string, NativeImpl> = {};
  for (const descriptor of hierarchy) {
    for (const key of Object.values(descriptor.defaults)) {
      impls[key] = () => key;
    }
  }
  return impls;
}

/**
 * Register `hierarchy` on a fresh bridge backed by plain objects.
 */
export function openBridge(hierarchy: readonly HierarchyDescriptor[], logger?: Logger): DispatchBridge<object> {
  const bridge = new DispatchBridge<object>({ host: new ObjectHost(), logger });
  registerHierarchy(bridge, hierarchy, labelImplementations(hierarchy));
  return bridge;
}
