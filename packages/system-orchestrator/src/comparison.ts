import { PortfolioReport } from './AnalysisOrchestrator';

export type ComparisonMetric =
  | 'totalReturn'
  | 'annualizedReturn'
  | 'annualizedVolatility'
  | 'sharpeRatio'
  | 'sortinoRatio'
  | 'calmarRatio'
  | 'maxDrawdown'
  | 'valueAtRisk'
  | 'conditionalVaR'
  | 'diversificationRatio'
  | 'effectiveAssets';

export interface ComparisonRow {
  name: string;
  rank: number;
  values: Record<ComparisonMetric, number>;
}

export interface PortfolioComparison {
  rankedBy: ComparisonMetric;
  /** Confidence level the VaR columns are taken at */
  confidence: number;
  rows: ComparisonRow[];
}

function comparisonValues(report: PortfolioReport, confidence: number): Record<ComparisonMetric, number> {
  const { performance, diversification } = report;
  const tail = report.risk.results.find(r => r.confidence === confidence) ?? report.risk.results[0];
  return {
    totalReturn: performance.totalReturn,
    annualizedReturn: performance.annualizedReturn,
    annualizedVolatility: performance.annualizedVolatility,
    sharpeRatio: performance.sharpeRatio,
    sortinoRatio: performance.sortinoRatio,
    calmarRatio: performance.calmarRatio,
    maxDrawdown: performance.maxDrawdown,
    valueAtRisk: tail.valueAtRisk,
    conditionalVaR: tail.conditionalVaR,
    diversificationRatio: diversification.ratio,
    effectiveAssets: diversification.effectiveAssets
  };
}

/**
 * Side-by-side table of portfolio runs, highest `rankBy` first. Drawdown
 * and VaR are negative, so ranking by them puts the shallowest loss first.
 * Ties keep input order.
 */
export function comparePortfolios(
  reports: ReadonlyMap<string, PortfolioReport>,
  rankBy: ComparisonMetric = 'sharpeRatio',
  confidence = 0.95
): PortfolioComparison {
  const rows = [...reports.entries()]
    .map(([name, report]) => ({ name, values: comparisonValues(report, confidence) }))
    .sort((a, b) => b.values[rankBy] - a.values[rankBy])
    .map((row, i): ComparisonRow => ({ ...row, rank: i + 1 }));

  return { rankedBy: rankBy, confidence, rows };
}
