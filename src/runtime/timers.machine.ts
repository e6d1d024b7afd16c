/*
 * Host timer state machine (robot3)
 *
 * The engine only asks for timers through TimerReconfigure/TimerStop events;
 * this machine owns the real ones. At most one timer runs at a time:
 *
 * idle → gravity   (ARM_GRAVITY)     periodic setInterval
 * idle → lockDelay (ARM_LOCK_DELAY)  one-shot setTimeout
 * gravity ⇄ lockDelay                arming one clears the other
 * lockDelay → idle (LOCK_FIRED)      the one-shot ran out
 * any → idle       (STOP_*, DISPOSE)
 *
 * Context stays immutable and only records the last armed durations; the
 * Node timer handles live in the service, reached through the actions.
 */

import {
  action,
  createMachine,
  guard,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import { debugLog } from "../utils/debug";

import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

export type TimerState = "idle" | "gravity" | "lockDelay";

export type TimerContext = {
  gravityMs: number | undefined; // interval of the last armed gravity timer
  lockDelayMs: number | undefined; // delay of the last armed lock timer
};

export type TimerEvent =
  | { type: "ARM_GRAVITY"; intervalMs: number }
  | { type: "ARM_LOCK_DELAY"; delayMs: number }
  | { type: "STOP_GRAVITY" }
  | { type: "STOP_LOCK_DELAY" }
  | { type: "LOCK_FIRED" }
  | { type: "DISPOSE" };

// Side effects the machine drives; implemented by the service
export type TimerEffects = {
  startGravity: (intervalMs: number) => void;
  startLockDelay: (delayMs: number) => void;
  clearAll: () => void;
};

// Guards

const isArmGravity = (_ctx: TimerContext, event: TimerEvent): boolean =>
  event.type === "ARM_GRAVITY" && event.intervalMs > 0;

const isArmLockDelay = (_ctx: TimerContext, event: TimerEvent): boolean =>
  event.type === "ARM_LOCK_DELAY" && event.delayMs >= 0;

// Reducers

export const recordGravity = (
  ctx: TimerContext,
  event: TimerEvent,
): TimerContext =>
  event.type === "ARM_GRAVITY" ? { ...ctx, gravityMs: event.intervalMs } : ctx;

export const recordLockDelay = (
  ctx: TimerContext,
  event: TimerEvent,
): TimerContext =>
  event.type === "ARM_LOCK_DELAY" ? { ...ctx, lockDelayMs: event.delayMs } : ctx;

// Action creators

const createTimerActions = (
  effects: TimerEffects,
): {
  armGravity: (ctx: TimerContext, event: TimerEvent) => void;
  armLockDelay: (ctx: TimerContext, event: TimerEvent) => void;
  clear: (ctx: TimerContext, event: TimerEvent) => void;
} => ({
  armGravity: (_ctx, event) => {
    if (event.type !== "ARM_GRAVITY") return;
    effects.clearAll();
    effects.startGravity(event.intervalMs);
  },
  armLockDelay: (_ctx, event) => {
    if (event.type !== "ARM_LOCK_DELAY") return;
    effects.clearAll();
    effects.startLockDelay(event.delayMs);
  },
  clear: () => {
    effects.clearAll();
  },
});

type TimerActions = ReturnType<typeof createTimerActions>;
type TimerEventType = TimerEvent["type"];

// Arming is accepted in every state
const armGravityTransition = (
  actions: TimerActions,
): Transition<TimerEventType> =>
  transition(
    "ARM_GRAVITY",
    "gravity",
    guard(isArmGravity),
    reduce(recordGravity),
    action(actions.armGravity),
  );

const armLockDelayTransition = (
  actions: TimerActions,
): Transition<TimerEventType> =>
  transition(
    "ARM_LOCK_DELAY",
    "lockDelay",
    guard(isArmLockDelay),
    reduce(recordLockDelay),
    action(actions.armLockDelay),
  );

const createIdleState = (actions: TimerActions): MachineState<TimerEventType> =>
  state(armGravityTransition(actions), armLockDelayTransition(actions));

const createGravityState = (
  actions: TimerActions,
): MachineState<TimerEventType> =>
  state(
    armGravityTransition(actions),
    armLockDelayTransition(actions),
    transition("STOP_GRAVITY", "idle", action(actions.clear)),
    transition("DISPOSE", "idle", action(actions.clear)),
  );

const createLockDelayState = (
  actions: TimerActions,
): MachineState<TimerEventType> =>
  state(
    armGravityTransition(actions),
    armLockDelayTransition(actions),
    transition("STOP_LOCK_DELAY", "idle", action(actions.clear)),
    transition("LOCK_FIRED", "idle", action(actions.clear)),
    transition("DISPOSE", "idle", action(actions.clear)),
  );

type TimerStatesObject = Record<TimerState, MachineState<TimerEventType>>;
export type TimerMachine = Machine<
  TimerStatesObject,
  TimerContext,
  TimerState,
  TimerEventType
>;

export const createTimerMachine = (effects: TimerEffects): TimerMachine => {
  const actions = createTimerActions(effects);

  const states = {
    gravity: createGravityState(actions),
    idle: createIdleState(actions),
    lockDelay: createLockDelayState(actions),
  } as const;

  // robot3 widens the event type to string; keep ours at the module boundary
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<TimerStatesObject, TimerEventType>,
    (): TimerContext => ({ gravityMs: undefined, lockDelayMs: undefined }),
  ) as unknown as TimerMachine;
};

type TimerService = Service<TimerMachine>;

export type TimerCallbacks = {
  onGravityTick: () => void;
  onLockDelayExpired: () => void;
};

/**
 * Thin wrapper around the robot3 service that holds the Node timer handles.
 */
export class TimerMachineService {
  private readonly service: TimerService;
  private currentStateName: TimerState = "idle";
  private gravityHandle: ReturnType<typeof setInterval> | undefined;
  private lockHandle: ReturnType<typeof setTimeout> | undefined;

  constructor(private readonly callbacks: TimerCallbacks) {
    const machine = createTimerMachine({
      clearAll: () => {
        this.clearAll();
      },
      startGravity: (intervalMs) => {
        this.gravityHandle = setInterval(() => {
          this.callbacks.onGravityTick();
        }, intervalMs);
      },
      startLockDelay: (delayMs) => {
        this.lockHandle = setTimeout(() => {
          this.lockHandle = undefined;
          this.send({ type: "LOCK_FIRED" });
          this.callbacks.onLockDelayExpired();
        }, delayMs);
      },
    });

    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  send(event: TimerEvent): void {
    debugLog("timers", `${this.currentStateName} <- ${event.type}`);
    this.service.send(event);
  }

  getState(): { state: TimerState; context: TimerContext } {
    return {
      context: { ...this.service.context },
      state: this.currentStateName,
    };
  }

  dispose(): void {
    this.send({ type: "DISPOSE" });
    // DISPOSE is not accepted from idle; make sure nothing is left either way
    this.clearAll();
  }

  private clearAll(): void {
    if (this.gravityHandle !== undefined) {
      clearInterval(this.gravityHandle);
      this.gravityHandle = undefined;
    }
    if (this.lockHandle !== undefined) {
      clearTimeout(this.lockHandle);
      this.lockHandle = undefined;
    }
  }
}
