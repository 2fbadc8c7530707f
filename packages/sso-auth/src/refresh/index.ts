export {
  createRefreshOrchestrator,
  summarizeOutcomes,
  validateMaxConcurrency,
} from './orchestrator.js';
export type {
  RefreshManyOptions,
  RefreshOrchestrator,
  RefreshOrchestratorConfig,
  RefreshOutcome,
  RefreshSummary,
} from './types.js';
