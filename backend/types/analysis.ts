export const SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const VULNERABILITY_CATEGORIES = [
  "reentrancy",
  "integer_overflow",
  "access_control",
  "unchecked_call",
  "frontrunning",
  "other",
] as const;
export type VulnerabilityCategory = (typeof VULNERABILITY_CATEGORIES)[number];

export const CONFIDENCE_LEVELS = ["high", "medium", "low"] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export const ANALYSIS_STATUSES = ["pending", "processing", "completed", "failed"] as const;
export type AnalysisStatus = (typeof ANALYSIS_STATUSES)[number];

export const TERMINAL_STATUSES: readonly AnalysisStatus[] = ["completed", "failed"];

export const NETWORKS = ["polygon", "ethereum", "arbitrum", "optimism", "base"] as const;
export type Network = (typeof NETWORKS)[number];

export interface ContractSource {
  id: string;
  name: string;
  code: string;
  codeHash: string;
  network: Network;
  address: string | null;
  verified: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface AnalysisRun {
  id: string;
  contractId: string;
  status: AnalysisStatus;
  overallRisk: Severity | null;
  riskScore: number | null;
  summary: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
  scanDurationMs: number | null;
  totalLines: number | null;
  functionsAnalyzed: number | null;
  detectionModel: string;
  explanationModel: string;
  errorMessage: string | null;
  errorDetails: string | null;
  createdAt: Date;
}

export interface ExplanationFields {
  description: string | null;
  impact: string | null;
  recommendation: string | null;
  fixedCode: string | null;
}

export interface FindingDraft extends ExplanationFields {
  category: VulnerabilityCategory;
  severity: Severity;
  confidence: ConfidenceLevel;
  lineStart: number | null;
  lineEnd: number | null;
  functionName: string | null;
  codeSnippet: string | null;
  briefReason: string | null;
  // Reserved for dynamic verification; nothing sets it yet.
  verified: boolean;
}

export interface Finding extends FindingDraft {
  id: string;
  analysisId: string;
  createdAt: Date;
}

/** A finding exactly as the detection model returned it. */
export type RawFinding = Record<string, unknown>;

export interface AnalysisReport {
  analysis: AnalysisRun;
  contract: Pick<ContractSource, "id" | "name" | "network">;
  findings: Finding[];
}

export interface AnalysisJobPayload {
  analysisId: string;
  contractId: string;
}

const includes = <T extends string>(values: readonly T[], value: string): value is T =>
  values.some((entry) => entry === value);

export const isSeverity = (value: string): value is Severity => includes(SEVERITIES, value);

export const isVulnerabilityCategory = (value: string): value is VulnerabilityCategory =>
  includes(VULNERABILITY_CATEGORIES, value);

export const isConfidenceLevel = (value: string): value is ConfidenceLevel =>
  includes(CONFIDENCE_LEVELS, value);

export const isTerminalStatus = (status: AnalysisStatus): boolean =>
  TERMINAL_STATUSES.includes(status);

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
