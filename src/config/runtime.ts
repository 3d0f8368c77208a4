import { resolve } from 'node:path';
import { config as loadDotEnv } from 'dotenv';

import { DEFAULT_WAITSET_CAPACITY, MAX_WAITSET_CAPACITY } from '../waitset/schema.js';

export interface RuntimeConfig {
  capacity: number;
  demo: {
    activationIntervalMs: number;
    actionDelayMs: number;
    pollIntervalMs: number;
    iterations: number;
  };
  audit: {
    enabled: boolean;
    filePath: string;
    maxEventBytes: number;
    maxFileBytes: number;
    maxFiles: number;
  };
}

type ArgMap = Record<string, string>;

export function loadRuntimeConfig(argv = process.argv.slice(2), env = process.env): RuntimeConfig {
  loadDotEnv({ quiet: true });

  const args = parseArgs(argv);

  return {
    capacity: parseInteger(
      args.capacity ?? env.WAITSET_CAPACITY ?? String(DEFAULT_WAITSET_CAPACITY),
      'wait-set capacity',
      1,
      MAX_WAITSET_CAPACITY
    ),
    demo: {
      activationIntervalMs: parseInteger(
        args['activation-interval-ms'] ?? env.WAITSET_ACTIVATION_INTERVAL_MS ?? '1000',
        'activation interval ms',
        0,
        3_600_000
      ),
      actionDelayMs: parseInteger(
        args['action-delay-ms'] ?? env.WAITSET_ACTION_DELAY_MS ?? '1000',
        'action delay ms',
        0,
        3_600_000
      ),
      pollIntervalMs: parseInteger(
        args['poll-interval-ms'] ?? env.WAITSET_POLL_INTERVAL_MS ?? '5000',
        'poll interval ms',
        1,
        3_600_000
      ),
      iterations: parseInteger(
        args.iterations ?? env.WAITSET_ITERATIONS ?? '0',
        'iterations',
        0,
        1_000_000
      )
    },
    audit: {
      enabled: parseBoolean(args['audit-enabled'] ?? env.WAITSET_AUDIT_ENABLED ?? 'false'),
      filePath: resolve(args['audit-file'] ?? env.WAITSET_AUDIT_FILE ?? '.trigger-waitset/audit.log'),
      maxEventBytes: parseInteger(
        args['audit-max-event-bytes'] ?? env.WAITSET_AUDIT_MAX_EVENT_BYTES ?? '20000',
        'audit max event bytes',
        1,
        1_000_000
      ),
      maxFileBytes: parseInteger(
        args['audit-max-file-bytes'] ?? env.WAITSET_AUDIT_MAX_FILE_BYTES ?? '10000000',
        'audit max file bytes',
        1,
        1_000_000_000
      ),
      maxFiles: parseInteger(
        args['audit-max-files'] ?? env.WAITSET_AUDIT_MAX_FILES ?? '5',
        'audit max files',
        1,
        100
      )
    }
  };
}

function parseArgs(argv: string[]): ArgMap {
  const args: ArgMap = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token || !token.startsWith('--')) {
      continue;
    }

    const flag = token.slice(2);
    const eqIndex = flag.indexOf('=');
    if (eqIndex > -1) {
      const key = flag.slice(0, eqIndex);
      const value = flag.slice(eqIndex + 1);
      if (key.length > 0 && value.length > 0) {
        args[key] = value;
      }
      continue;
    }

    const next = argv[i + 1];
    if (next && !next.startsWith('--')) {
      args[flag] = next;
      i += 1;
      continue;
    }

    args[flag] = 'true';
  }

  return args;
}

function parseInteger(value: string, label: string, min: number, max: number): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed.length === 0 || !Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new Error(`Invalid ${label} "${value}". Expected ${min}-${max}.`);
  }

  return parsed;
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  throw new Error(`Invalid boolean value "${value}".`);
}
