export {
  AnalysisSession,
  type AnalysisSessionOptions,
  type SessionOutcome,
  type SessionStatus,
} from './analysis-session.js';
export {
  AGGREGATE_OPTIONS,
  INVESTIGATION_OPTIONS,
  METRIC_OPTIONS,
  type AggregateCommand,
  type CommandOption,
  type InvestigationMode,
  type MetricCommand,
  type SelectionPrompter,
} from './prompter.js';
