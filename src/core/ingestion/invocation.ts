export type InvocationState = "Idle" | "Fetching" | "Landing" | "Notifying" | "Done" | "Failed";

const allowedTransitions: Readonly<Record<InvocationState, readonly InvocationState[]>> = {
  Idle: ["Fetching"],
  Fetching: ["Landing", "Failed"],
  Landing: ["Notifying", "Failed"],
  Notifying: ["Done", "Failed"],
  Done: [],
  Failed: []
};

export class IllegalTransitionError extends Error {
  constructor(readonly from: InvocationState, readonly to: InvocationState) {
    super(`Illegal invocation transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export const canTransition = (from: InvocationState, to: InvocationState): boolean =>
  allowedTransitions[from].includes(to);

export const isTerminal = (state: InvocationState): boolean => state === "Done" || state === "Failed";

export type InvocationTracker = {
  readonly invocationId: string;
  current: () => InvocationState;
  history: () => InvocationState[];
  /** Last non-terminal state entered; the stage a failure happened in. */
  stage: () => InvocationState;
  transition: (to: InvocationState) => void;
};

export const createInvocationTracker = (
  invocationId: string,
  onTransition?: (ctx: { invocationId: string; from: InvocationState; to: InvocationState }) => void
): InvocationTracker => {
  const states: InvocationState[] = ["Idle"];
  let stage: InvocationState = "Idle";

  const current = () => states[states.length - 1] ?? "Idle";

  return {
    invocationId,
    current,
    history: () => [...states],
    stage: () => stage,
    transition: (to) => {
      const from = current();
      if (!canTransition(from, to)) {
        throw new IllegalTransitionError(from, to);
      }
      states.push(to);
      if (!isTerminal(to)) stage = to;
      onTransition?.({ invocationId, from, to });
    }
  };
};
