import type { AppConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import type { AgentEngine } from './types.js';
import { MockEngine } from './mock.js';
import { ProcessEngine } from './process.js';

export const buildEngine = (config: AppConfig): AgentEngine => {
  if (config.ENGINE_MODE === 'mock') {
    return new MockEngine();
  }

  return new ProcessEngine({
    command: config.ENGINE_COMMAND,
    args: config.ENGINE_ARGS,
    model: config.ENGINE_MODEL || undefined,
    permissionMode: config.ENGINE_PERMISSION_MODE,
    defaultLimits: {
      maxTurns: config.ENGINE_MAX_TURNS || undefined,
      maxBudgetUsd: config.ENGINE_MAX_BUDGET_USD || undefined,
    },
    logger: createLogger('engine.process', config.LOG_LEVEL),
  });
};
