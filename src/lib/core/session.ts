import type { ControlFrame } from "../protocol/interfaces/frames.ts";
import type { FrameInbox } from "../transport/frame-inbox.ts";
import { FlowController } from "./flow-controller.ts";

/**
 * Protocol states of one job
 */
export enum JobState {
  IDLE = "idle",
  AWAITING_STATUS = "awaiting_status",
  STARTING = "starting",
  STREAMING = "streaming",
  AWAITING_COMPLETION = "awaiting_completion",
  ACKNOWLEDGING = "acknowledging",
  DONE = "done",
  FAILED = "failed",
}

export function isTerminal(state: JobState): boolean {
  return state === JobState.DONE || state === JobState.FAILED;
}

let nextSessionId = 1;

/**
 * Connection-scoped context of a single job
 *
 * Owned by the JobStateMachine for the length of one print call and thrown
 * away afterwards, even on success.
 */
export class Session {
  readonly id = nextSessionId++;
  state: JobState = JobState.IDLE;

  /** Capability frame from the device; contents are opaque */
  status: ControlFrame | null;

  /** Outstanding-write counter */
  readonly flow: FlowController;

  /** Blocks handed to the transport */
  blocksSent = 0;

  /** COMPLETE frames absorbed after the ack */
  repeatedCompletions = 0;

  /** Frames observed and ignored while waiting */
  discardedFrames = 0;

  constructor(
    readonly inbox: FrameInbox,
    flowControlWindow: number,
    status: ControlFrame | null = null,
  ) {
    this.flow = new FlowController(flowControlWindow);
    this.status = status;
  }
}
