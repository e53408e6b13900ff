/**
 * Build the PII engine the CLI runs with: loaded configuration plus
 * command-line overrides.
 */

import { loadConfig, parseThreshold } from '../config.js';
import { PIIEngine } from '../pii/engine.js';
import type { ResolvedConfig } from '../types.js';

export interface EngineFlags {
  threshold?: string;
  disable?: boolean;
}

export interface CliEngine {
  engine: PIIEngine;
  resolved: ResolvedConfig;
}

export async function createCliEngine(flags: EngineFlags = {}): Promise<CliEngine> {
  const resolved = await loadConfig();
  const pii = { ...resolved.config.pii };

  if (flags.threshold !== undefined) {
    pii.threshold = parseThreshold(flags.threshold, '--threshold');
  }
  if (flags.disable) {
    pii.enabled = false;
  }

  return {
    engine: new PIIEngine(pii),
    resolved: { ...resolved, config: { ...resolved.config, pii } },
  };
}
