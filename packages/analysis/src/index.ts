/**
 * @queens/analysis - Statistics and reporting for Monte Carlo experiments
 */

export {
  calculateStatistics,
  median,
  percentile,
  sum,
  type Statistics,
} from './statistics.js';
export {
  summarizeExperiment,
  type ExperimentSummary,
  type ExperimentTiming,
} from './summary.js';
export {
  formatHeader,
  formatTrialLine,
  formatSummary,
  type ReportOptions,
} from './report.js';
