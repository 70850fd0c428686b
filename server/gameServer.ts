import { performance } from 'node:perf_hooks';
import { TICK_PERIOD_MS } from '../src/config.ts';
import { Game, type AdvanceResult, type GameSnapshot } from '../src/game.ts';
import type { EntropySource } from '../src/rng.ts';
import { GameSerializer } from '../src/serializer.ts';
import { bcdToNumber } from '../src/score.ts';
import type { ServerConfig } from './config.ts';
import { ControllerRegistry } from './controllerRegistry.ts';
import { forModule, type Logger, type ModuleLogger } from './logger.ts';
import type { ClientType, ServerMessage, StatusMsg, TiltMsg, TurnMsg } from './protocol.ts';

/** Outbound side of the WebSocket hub used by the game server. */
export interface GameBroadcaster {
  broadcastFrame(buffer: Uint8Array): void;
  broadcastStatus(status: StatusMsg): void;
  sendJsonTo(connId: number, payload: ServerMessage): void;
  hasFrameRecipients(): boolean;
}

/** Server-side tick loop around a single game. */
export class GameServer {
  /** Game instance that owns all board state. */
  private game: Game;
  /** Outbound message sink. */
  private hub: GameBroadcaster;
  /** Controller ownership and rate limiting. */
  private controllers: ControllerRegistry;
  /** Logger bound to this module. */
  private log: ModuleLogger;
  /** Interval between status broadcasts in ms. */
  private statusIntervalMs: number;
  /** Server tick id, counted across restarts. */
  private tickId = 0;
  /** Timestamp of the last status message in ms. */
  private lastStatusSentAt = 0;
  /** Whether the main loop is running. */
  private running = false;
  /** Active timer id for scheduled ticks. */
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Target time for the next tick in ms. */
  private nextTickAt = 0;

  /**
   * Create a game server.
   * @param config - Normalized server configuration.
   * @param hub - Outbound broadcaster.
   * @param logger - Root logger.
   * @param entropy - Entropy source for PRNG seeding.
   */
  constructor(config: ServerConfig, hub: GameBroadcaster, logger: Logger, entropy?: EntropySource) {
    this.hub = hub;
    this.log = forModule(logger, 'game');
    this.statusIntervalMs = config.statusIntervalMs;
    this.game = entropy ? new Game({ entropy }) : new Game();
    this.controllers = new ControllerRegistry(
      {
        maxInputsPerTick: config.maxInputsPerTick,
        maxInputsPerSecond: config.maxInputsPerSecond
      },
      { send: (connId, payload) => this.hub.sendJsonTo(connId, payload) }
    );
  }

  /** Start the server tick loop. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.nextTickAt = performance.now() + TICK_PERIOD_MS;
    this.loop();
  }

  /** Stop the server tick loop. */
  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  /**
   * Return the current server tick id.
   * @returns Tick id.
   */
  getTickId(): number {
    return this.tickId;
  }

  /**
   * Return the latest committed game state.
   * @returns Frozen snapshot.
   */
  getSnapshot(): GameSnapshot {
    return this.game.snapshot();
  }

  /**
   * Return the connection that currently steers.
   * @returns Connection id or null.
   */
  getControllerId(): number | null {
    return this.controllers.getHolder();
  }

  /**
   * Handle a completed handshake.
   * @param connId - Connection id.
   * @param clientType - Declared client type.
   */
  handleHello(connId: number, clientType: ClientType): void {
    if (clientType === 'controller') {
      const granted = this.controllers.register(connId);
      this.log.info(`controller ${connId} connected (${granted ? 'steering' : 'waiting'})`);
    }
    this.hub.sendJsonTo(connId, this.buildStatus());
  }

  /**
   * Apply a tilt sample from the steering controller.
   * @param connId - Connection id.
   * @param msg - Tilt message payload.
   */
  handleTilt(connId: number, msg: TiltMsg): void {
    if (!this.accept(connId, 'tilt')) return;
    this.game.applyTilt(msg.vertical, msg.horizontal);
  }

  /**
   * Apply a direct direction request from the steering controller.
   * @param connId - Connection id.
   * @param msg - Turn message payload.
   */
  handleTurn(connId: number, msg: TurnMsg): void {
    if (!this.accept(connId, 'turn')) return;
    this.game.requestDirection(msg.dir);
  }

  /**
   * Restart the game now, ahead of the next tick.
   * @param connId - Requesting connection id, or null for HTTP requests.
   */
  handleRestart(connId: number | null): void {
    if (connId !== null && this.controllers.getHolder() !== connId) {
      this.log.debug(`restart from ${connId} ignored: not steering`);
      return;
    }
    this.game.advance({ restart: true });
    this.log.info(`game restarted by ${connId === null ? 'http' : `controller ${connId}`}`);
    this.publish(performance.now(), true);
  }

  /**
   * Handle connection teardown and cleanup.
   * @param connId - Connection id.
   */
  handleDisconnect(connId: number): void {
    const next = this.controllers.release(connId);
    if (next !== null) this.log.info(`controller ${next} took over from ${connId}`);
  }

  /**
   * Run one game step immediately and publish its frame.
   * @returns What the step did.
   */
  step(): AdvanceResult {
    return this.tick(performance.now());
  }

  /** Main timer loop for scheduling ticks. */
  private loop(): void {
    if (!this.running) return;
    const now = performance.now();
    if (now >= this.nextTickAt) {
      this.tick(now);
      this.nextTickAt += TICK_PERIOD_MS;
      // After a long stall, resume the cadence from now rather than bursting.
      if (this.nextTickAt < now) this.nextTickAt = now + TICK_PERIOD_MS;
    }
    const delay = Math.max(0, this.nextTickAt - now);
    this.timer = setTimeout(() => this.loop(), delay);
  }

  /**
   * Run a single tick and broadcast the committed state.
   * @param now - Current high-resolution timestamp.
   * @returns What the step did.
   */
  private tick(now: number): AdvanceResult {
    this.tickId += 1;
    this.controllers.setTickId(this.tickId);
    const wasOver = this.game.gameOver;
    const result = this.game.advance({ tick: true });
    if (result.collision && !wasOver) {
      const snapshot = this.game.snapshot();
      this.log.info(
        `game over: ${result.collision} collision at length ${snapshot.length}, score ${bcdToNumber(snapshot.score)}`
      );
    }
    this.publish(now, result.consumed || result.collision !== null);
    return result;
  }

  /**
   * Send the current frame, and the status when due or forced.
   * @param now - Current high-resolution timestamp.
   * @param forceStatus - Send status regardless of the interval.
   */
  private publish(now: number, forceStatus: boolean): void {
    if (this.hub.hasFrameRecipients()) {
      this.hub.broadcastFrame(GameSerializer.serialize(this.game.snapshot()));
    }
    if (forceStatus || now - this.lastStatusSentAt >= this.statusIntervalMs) {
      this.hub.broadcastStatus(this.buildStatus());
      this.lastStatusSentAt = now;
    }
  }

  private accept(connId: number, kind: string): boolean {
    if (this.controllers.accept(connId)) return true;
    this.log.debug(`${kind} from ${connId} dropped (${this.controllers.getDroppedInputs(connId)} dropped)`);
    return false;
  }

  /**
   * Build the status payload broadcast to clients.
   * @returns Status message payload.
   */
  private buildStatus(): StatusMsg {
    const snapshot = this.game.snapshot();
    return {
      type: 'status',
      tick: snapshot.tick,
      length: snapshot.length,
      score: snapshot.score,
      digits: [...snapshot.digits],
      gameOver: snapshot.gameOver,
      fruitPending: snapshot.fruit.pending
    };
  }
}
