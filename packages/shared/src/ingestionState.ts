export const ingestionStates = [
  "RECEIVED",
  "AUTHORIZING",
  "ENRICHING",
  "COMPOSING",
  "PERSISTING",
  "BROADCASTING",
  "COMPLETED",
  "FAILED"
] as const;
export type IngestionState = (typeof ingestionStates)[number];

export type IngestionStateTransition = {
  from: IngestionState;
  to: IngestionState;
};

const terminalStates: readonly IngestionState[] = ["COMPLETED", "FAILED"];

const forwardTransitions: IngestionStateTransition[] = [
  { from: "RECEIVED", to: "AUTHORIZING" },
  { from: "AUTHORIZING", to: "ENRICHING" },
  { from: "ENRICHING", to: "COMPOSING" },
  { from: "COMPOSING", to: "PERSISTING" },
  { from: "PERSISTING", to: "BROADCASTING" },
  { from: "BROADCASTING", to: "COMPLETED" }
];

// Every non-terminal state may fail.
const allowedTransitions: IngestionStateTransition[] = [
  ...forwardTransitions,
  ...ingestionStates
    .filter((state) => !terminalStates.includes(state))
    .map((from): IngestionStateTransition => ({ from, to: "FAILED" }))
];

export type IngestionStateErrorCode =
  | "UNKNOWN_STATE"
  | "SAME_STATE"
  | "TRANSITION_NOT_ALLOWED";

export class IngestionStateError extends Error {
  constructor(
    message: string,
    public code: IngestionStateErrorCode,
    public details?: { from?: string; to?: string }
  ) {
    super(message);
    this.name = "IngestionStateError";
  }
}

export function isValidIngestionState(state: string): state is IngestionState {
  return ingestionStates.some((known) => known === state);
}

export function isTerminalIngestionState(state: IngestionState): boolean {
  return terminalStates.includes(state);
}

export function enforceIngestionTransition(from: string, to: string): IngestionState {
  if (!isValidIngestionState(from)) {
    throw new IngestionStateError("Unknown from state", "UNKNOWN_STATE", { from, to });
  }
  if (!isValidIngestionState(to)) {
    throw new IngestionStateError("Unknown to state", "UNKNOWN_STATE", { from, to });
  }
  if (from === to) {
    throw new IngestionStateError("No-op transition", "SAME_STATE", { from, to });
  }
  const allowed = allowedTransitions.some((t) => t.from === from && t.to === to);
  if (!allowed) {
    throw new IngestionStateError("Transition not allowed", "TRANSITION_NOT_ALLOWED", {
      from,
      to
    });
  }
  return to;
}
