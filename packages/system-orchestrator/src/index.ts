/**
 * @quantbench/system-orchestrator
 *
 * End-to-end analysis runs over caller-supplied price series, portfolio
 * comparison tables and the daily snapshot for scheduled reports.
 */

export * from './AnalysisOrchestrator';
export * from './comparison';
export * from './DailySnapshot';
