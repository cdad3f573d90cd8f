import { AnalysisRun, AnalysisStatus } from "../../types/analysis";
import { AnalysisError } from "../../utils/analysisErrors";

const ALLOWED_TRANSITIONS: Readonly<Record<AnalysisStatus, readonly AnalysisStatus[]>> = {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export const canTransition = (from: AnalysisStatus, to: AnalysisStatus): boolean =>
  ALLOWED_TRANSITIONS[from].includes(to);

type RunChanges = Partial<Omit<AnalysisRun, "id" | "contractId" | "status" | "createdAt">>;

/** Returns a copy of the run in its next state; status only ever moves forward. */
export const transitionRun = (
  run: AnalysisRun,
  to: AnalysisStatus,
  changes: RunChanges = {}
): AnalysisRun => {
  if (!canTransition(run.status, to)) {
    throw new AnalysisError(`Analysis ${run.id} cannot move from ${run.status} to ${to}`);
  }
  return { ...run, ...changes, status: to };
};
