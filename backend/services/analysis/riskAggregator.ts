import { SEVERITIES, Severity, isSeverity } from "../../types/analysis";

/** Anything carrying a severity as the detection model reported it. */
export interface SeverityCarrier {
  readonly severity?: unknown;
}

export const SEVERITY_POINTS: Readonly<Record<Severity, number>> = {
  critical: 40,
  high: 25,
  medium: 15,
  low: 5,
  info: 1,
};

export const UNKNOWN_SEVERITY_POINTS = 10;
export const MAX_RISK_SCORE = 100;

const reportedSeverity = (finding: SeverityCarrier): string | null =>
  typeof finding.severity === "string" ? finding.severity.toLowerCase() : null;

/**
 * Highest recognized severity among the reported labels, `info` when none is
 * recognized. Findings with a missing or unknown severity do not count here,
 * even though the normalizer stores them as `medium`, so such a run can read
 * `info` overall while holding a `medium` finding.
 */
export const highestSeverity = (findings: readonly SeverityCarrier[]): Severity => {
  const reported = new Set(findings.map(reportedSeverity));
  return SEVERITIES.find((severity) => reported.has(severity)) ?? "info";
};

const pointsFor = (finding: SeverityCarrier): number => {
  // A finding without a severity is scored as medium, same as the normalizer stores it.
  if (finding.severity === undefined || finding.severity === null) {
    return SEVERITY_POINTS.medium;
  }
  const severity = reportedSeverity(finding);
  return severity !== null && isSeverity(severity) ? SEVERITY_POINTS[severity] : UNKNOWN_SEVERITY_POINTS;
};

/** Additive score, saturating at 100: five medium findings outweigh one critical. */
export const riskScore = (findings: readonly SeverityCarrier[]): number => {
  const total = findings.reduce((acc, finding) => acc + pointsFor(finding), 0);
  return Math.min(MAX_RISK_SCORE, total);
};
