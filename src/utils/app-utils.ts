import type { ConnectionStep } from "../components/index.ts";
import { JobState } from "../lib/core/session.ts";

export function updateStepStatus(
  steps: ConnectionStep[],
  stepId: string,
  status: "pending" | "active" | "complete" | "error",
  nextStepId?: string,
): ConnectionStep[] {
  return steps.map((step) => {
    if (step.id === stepId) return { ...step, status };
    if (nextStepId && step.id === nextStepId)
      return { ...step, status: "active" };
    return step;
  });
}

/**
 * Job step shown in the UI for each protocol state, if any
 */
export function stepForState(state: JobState): string | null {
  switch (state) {
    case JobState.AWAITING_STATUS:
      return "status";
    case JobState.STARTING:
      return "start";
    case JobState.STREAMING:
      return "data";
    case JobState.AWAITING_COMPLETION:
      return "complete";
    case JobState.ACKNOWLEDGING:
      return "ack";
    default:
      return null;
  }
}

/**
 * Mark the step for a new state active and everything before it complete
 */
export function advanceJobSteps(
  steps: ConnectionStep[],
  state: JobState,
): ConnectionStep[] {
  if (state === JobState.DONE) {
    return steps.map((step) => ({ ...step, status: "complete" }));
  }
  if (state === JobState.FAILED) {
    return steps.map((step) =>
      step.status === "active" ? { ...step, status: "error" } : step,
    );
  }

  const stepId = stepForState(state);
  const index = steps.findIndex((step) => step.id === stepId);
  if (index === -1) {
    return steps;
  }
  return steps.map((step, i) => {
    if (i < index) return { ...step, status: "complete" };
    if (i === index) return { ...step, status: "active" };
    return step;
  });
}
