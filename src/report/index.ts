/**
 * Report module.
 * Text frames for the terminal dashboard and the run summary.
 */

export {
  progressBar,
  renderDashboard,
  renderFrame,
  renderLoading,
  renderSummary,
} from './dashboard.js';
