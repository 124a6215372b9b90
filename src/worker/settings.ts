/**
 * Worker settings: the contract a deployment module implements so the CLI can
 * build queues and jobs without knowing the backing store.
 *
 * @module
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import type { JobFactory } from '../job/types.js';
import type { Queue } from '../queue/types.js';
import { SettingsLoadError } from '../types/errors.js';
import { toErrorMessage } from '../utils/async.js';

export const DEFAULT_QUEUE_NAMESPACE = 'taskline';

export interface WorkerSettings {
  createJobFactory(): JobFactory;
  /** Build the queue named `name` inside `namespace` */
  createQueue(name: string, namespace: string): Queue;
  /** Key prefix passed to `createQueue` (default: "taskline") */
  queueNamespace?: string;
  onStartup?(): void | Promise<void>;
  onShutdown?(): void | Promise<void>;
  worker?: {
    pollIntervalMs?: number;
    gravekeeperIntervalMs?: number;
  };
}

const fn = <T>(name: string) =>
  z.custom<T>((value) => typeof value === 'function', { message: `${name} must be a function` });

const WorkerSettingsSchema = z
  .object({
    createJobFactory: fn<() => JobFactory>('createJobFactory'),
    createQueue: fn<(name: string, namespace: string) => Queue>('createQueue'),
    queueNamespace: z.string().min(1).optional(),
    onStartup: fn<() => void | Promise<void>>('onStartup').optional(),
    onShutdown: fn<() => void | Promise<void>>('onShutdown').optional(),
    worker: z
      .object({
        pollIntervalMs: z.number().positive().finite().optional(),
        gravekeeperIntervalMs: z.number().positive().finite().optional(),
      })
      .optional(),
  })
  .passthrough();

/**
 * Check that `value` implements {@link WorkerSettings}.
 *
 * @throws SettingsLoadError naming every offending field
 */
export function parseWorkerSettings(value: unknown, source = '<inline>'): WorkerSettings {
  const parsed = WorkerSettingsSchema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
      .join('; ');
    throw new SettingsLoadError(source, `invalid settings (${reason})`);
  }
  return parsed.data;
}

export interface SettingsSpecifier {
  modulePath: string;
  exportName?: string;
}

/**
 * Split `path/to/module.js#exportName`. The export name is optional.
 */
export function parseSettingsSpecifier(specifier: string): SettingsSpecifier {
  const hash = specifier.lastIndexOf('#');
  if (hash === -1) {
    return { modulePath: specifier };
  }
  const modulePath = specifier.slice(0, hash);
  const exportName = specifier.slice(hash + 1);
  if (!modulePath || !exportName) {
    throw new SettingsLoadError(specifier, 'expected <module>[#<export>]');
  }
  return { modulePath, exportName };
}

/**
 * Import a settings module and validate the chosen export. Without an
 * explicit `#exportName`, the `settings` export is used, then `default`.
 *
 * @throws SettingsLoadError if the module cannot be imported, the export is
 *   missing or it does not implement {@link WorkerSettings}
 */
export async function loadSettings(specifier: string, cwd = process.cwd()): Promise<WorkerSettings> {
  const { modulePath, exportName } = parseSettingsSpecifier(specifier);
  const url = pathToFileURL(resolve(cwd, modulePath)).href;

  let mod: unknown;
  try {
    mod = await import(url);
  } catch (err) {
    throw new SettingsLoadError(specifier, `cannot import module (${toErrorMessage(err)})`);
  }
  if (typeof mod !== 'object' || mod === null) {
    throw new SettingsLoadError(specifier, 'module did not load as an object');
  }

  let exported: unknown;
  if (exportName) {
    exported = Reflect.get(mod, exportName);
    if (exported === undefined) {
      throw new SettingsLoadError(specifier, `module has no export "${exportName}"`);
    }
  } else {
    exported = Reflect.get(mod, 'settings') ?? Reflect.get(mod, 'default');
    if (exported === undefined) {
      throw new SettingsLoadError(specifier, 'module exports neither "settings" nor a default');
    }
  }

  return parseWorkerSettings(exported, specifier);
}
