/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  StageProgressDisplay,
  createSpinner,
  renderProgressBar,
  formatDuration,
  type StageStatus,
  type StageDisplay,
  type SpinnerOptions,
} from './progress.js';

// Run and state summaries
export {
  formatRunOutcome,
  formatStateSummary,
  formatTaskLine,
  formatCheckpointLine,
  formatFeedbackLine,
} from './summary.js';
