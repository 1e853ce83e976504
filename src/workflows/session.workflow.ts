/**
 * Session Workflow - XState machine for one process invocation
 *
 * Created → Started → StreamsRunning → Draining → Exited
 * Cancellation: → Cancelling → Terminated
 * Launch or stream failure: → Failed
 */

import { createMachine, assign, type SnapshotFrom } from 'xstate';

export type SessionPhase =
  | 'created'
  | 'started'
  | 'streamsRunning'
  | 'draining'
  | 'exited'
  | 'cancelling'
  | 'terminated'
  | 'failed';

// Context types
export interface SessionContext {
  command: readonly string[];
  pid: number | null;
  pumps: string[];
  capturedLines: number;
  exitCode: number | null;
  forcibly: boolean;
  cancelReason: string | null;
  error: string | null;
}

export interface SessionInput {
  command: readonly string[];
}

// Event types
export type SessionEvent =
  | { type: 'LAUNCHED'; pid: number | null }
  | { type: 'PUMPS_STARTED'; pumps: string[] }
  | { type: 'PUMPS_DRAINED'; lines: number }
  | { type: 'EXITED'; exitCode: number }
  | { type: 'CANCEL'; reason: string }
  | { type: 'TERMINATION_REQUESTED'; forcibly: boolean }
  | { type: 'FAIL'; error: string };

export function createInitialContext(input: SessionInput): SessionContext {
  return {
    command: input.command,
    pid: null,
    pumps: [],
    capturedLines: 0,
    exitCode: null,
    forcibly: false,
    cancelReason: null,
    error: null,
  };
}

export const sessionMachine = createMachine({
  id: 'session',
  initial: 'created',
  types: {
    context: {} as SessionContext,
    events: {} as SessionEvent,
    input: {} as SessionInput,
  },
  context: ({ input }) => createInitialContext(input),
  states: {
    created: {
      description: 'Redirections resolved, process not launched yet',
      on: {
        LAUNCHED: {
          target: 'started',
          actions: assign({ pid: ({ event }) => event.pid }),
        },
        // Nothing was launched, so there is nothing to tear down.
        CANCEL: {
          target: 'terminated',
          actions: assign({ cancelReason: ({ event }) => event.reason }),
        },
        FAIL: {
          target: 'failed',
          actions: assign({ error: ({ event }) => event.error }),
        },
      },
    },
    started: {
      description: 'Process running, pumps not started',
      on: {
        PUMPS_STARTED: {
          target: 'streamsRunning',
          actions: assign({ pumps: ({ event }) => event.pumps }),
        },
        CANCEL: {
          target: 'cancelling',
          actions: assign({ cancelReason: ({ event }) => event.reason }),
        },
        FAIL: {
          target: 'failed',
          actions: assign({ error: ({ event }) => event.error }),
        },
      },
    },
    streamsRunning: {
      description: 'All pumps running concurrently',
      on: {
        PUMPS_DRAINED: {
          target: 'draining',
          actions: assign({ capturedLines: ({ event }) => event.lines }),
        },
        CANCEL: {
          target: 'cancelling',
          actions: assign({ cancelReason: ({ event }) => event.reason }),
        },
        FAIL: {
          target: 'failed',
          actions: assign({ error: ({ event }) => event.error }),
        },
      },
    },
    draining: {
      description: 'Pumps finished, waiting for the exit code',
      on: {
        EXITED: {
          target: 'exited',
          actions: assign({ exitCode: ({ event }) => event.exitCode }),
        },
        CANCEL: {
          target: 'cancelling',
          actions: assign({ cancelReason: ({ event }) => event.reason }),
        },
        FAIL: {
          target: 'failed',
          actions: assign({ error: ({ event }) => event.error }),
        },
      },
    },
    cancelling: {
      description: 'Cancellation observed, terminating the process',
      on: {
        TERMINATION_REQUESTED: {
          target: 'terminated',
          actions: assign({ forcibly: ({ event }) => event.forcibly }),
        },
      },
    },
    exited: {
      type: 'final',
      description: 'Process exited and every pump finished',
    },
    terminated: {
      type: 'final',
      description: 'Termination requested after cancellation',
    },
    failed: {
      type: 'final',
      description: 'Launch or stream failure',
    },
  },
});

// Helper functions for session state inspection

export type SessionSnapshot = SnapshotFrom<typeof sessionMachine>;

const PHASES: readonly SessionPhase[] = [
  'created',
  'started',
  'streamsRunning',
  'draining',
  'exited',
  'cancelling',
  'terminated',
  'failed',
];

export function getPhase(snapshot: SessionSnapshot): SessionPhase {
  const phase = PHASES.find((candidate) => candidate === snapshot.value);
  if (!phase) {
    throw new Error(`Unexpected session state: ${JSON.stringify(snapshot.value)}`);
  }
  return phase;
}

export function isTerminal(snapshot: SessionSnapshot): boolean {
  return snapshot.status === 'done';
}

export function isCancelled(snapshot: SessionSnapshot): boolean {
  return snapshot.value === 'terminated';
}
