import type { ControlMsg, ServerMessage } from './protocol.ts';

/** Rate limits for controller inputs. */
export interface ControllerRegistryOptions {
  maxInputsPerTick: number;
  maxInputsPerSecond: number;
}

/** Dependencies for notifying connections and reading time. */
export interface ControllerRegistryDeps {
  send: (connId: number, payload: ServerMessage) => void;
  now?: () => number;
}

/** Internal per-controller state tracked across ticks. */
interface ControllerState {
  connId: number;
  inputTickId: number;
  inputsThisTick: number;
  inputSecondStartMs: number;
  inputsThisSecond: number;
  droppedInputs: number;
}

/**
 * Tracks controller connections. Exactly one of them steers the snake at a
 * time; the rest wait in arrival order and take over when the holder leaves.
 */
export class ControllerRegistry {
  /** Controller state keyed by connection id, in arrival order. */
  private byConn = new Map<number, ControllerState>();
  /** Connection currently holding control. */
  private holderId: number | null = null;
  /** Current server tick id for per-tick limits. */
  private currentTickId = 0;
  /** Registry options for rate limiting. */
  private options: ControllerRegistryOptions;
  /** Sender for per-connection messages. */
  private send: ControllerRegistryDeps['send'];
  /** Millisecond clock. */
  private now: () => number;

  /**
   * Create a controller registry instance.
   * @param options - Rate limit configuration.
   * @param deps - Message sender and optional clock.
   */
  constructor(options: ControllerRegistryOptions, deps: ControllerRegistryDeps) {
    this.options = options;
    this.send = deps.send;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Update the current tick id used for per-tick limits.
   * @param tickId - Current server tick id.
   */
  setTickId(tickId: number): void {
    this.currentTickId = tickId;
  }

  /**
   * Return the connection holding control.
   * @returns Connection id or null when nobody steers.
   */
  getHolder(): number | null {
    return this.holderId;
  }

  /**
   * Add a controller connection and tell it whether it holds control.
   * @param connId - Connection id.
   * @returns True when the connection was granted control.
   */
  register(connId: number): boolean {
    if (!this.byConn.has(connId)) {
      this.byConn.set(connId, {
        connId,
        inputTickId: this.currentTickId,
        inputsThisTick: 0,
        inputSecondStartMs: this.now(),
        inputsThisSecond: 0,
        droppedInputs: 0
      });
    }
    if (this.holderId === null) this.holderId = connId;
    const granted = this.holderId === connId;
    this.notify(connId, granted);
    return granted;
  }

  /**
   * Remove a connection and hand control to the next waiting controller.
   * @param connId - Connection id.
   * @returns Connection id that took over, or null.
   */
  release(connId: number): number | null {
    if (!this.byConn.delete(connId)) return null;
    if (this.holderId !== connId) return null;
    this.holderId = null;
    const next = this.byConn.keys().next();
    if (next.done) return null;
    this.holderId = next.value;
    this.notify(next.value, true);
    return next.value;
  }

  /**
   * Decide whether an input from a connection may be applied, enforcing
   * control ownership and rate limits.
   * @param connId - Connection id sending the input.
   * @returns True when the input should be applied.
   */
  accept(connId: number): boolean {
    const state = this.byConn.get(connId);
    if (!state || this.holderId !== connId) return false;

    // Reset per-tick counters on tick change.
    if (state.inputTickId !== this.currentTickId) {
      state.inputTickId = this.currentTickId;
      state.inputsThisTick = 0;
    }
    const now = this.now();
    if (now - state.inputSecondStartMs >= 1000) {
      state.inputSecondStartMs = now;
      state.inputsThisSecond = 0;
    }
    if (state.inputsThisSecond >= this.options.maxInputsPerSecond) {
      state.droppedInputs += 1;
      return false;
    }
    state.inputsThisSecond += 1;
    if (state.inputsThisTick >= this.options.maxInputsPerTick) {
      state.droppedInputs += 1;
      return false;
    }
    state.inputsThisTick += 1;
    return true;
  }

  /**
   * Count inputs dropped for a connection.
   * @param connId - Connection id.
   * @returns Dropped input count (0 for unknown connections).
   */
  getDroppedInputs(connId: number): number {
    return this.byConn.get(connId)?.droppedInputs ?? 0;
  }

  private notify(connId: number, granted: boolean): void {
    const msg: ControlMsg = { type: 'control', granted };
    this.send(connId, msg);
  }
}
