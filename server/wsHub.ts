import type { Server } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { parseClientMessage } from './protocol.ts';
import type {
  ClientType,
  ServerMessage,
  StatusMsg,
  TiltMsg,
  TurnMsg,
  WelcomeMsg
} from './protocol.ts';

const DEFAULT_MAX_MESSAGE_BYTES = 4 * 1024;
const DEFAULT_MAX_BUFFERED_BYTES = 256 * 1024;

export interface ConnectionState {
  id: number;
  socket: WebSocket;
  clientType: 'unknown' | ClientType;
}

export interface WsHubOptions {
  maxMessageBytes?: number;
  maxBufferedAmount?: number;
  onProtocolError?: (connId: number, message: string) => void;
}

export interface WsHubHandlers {
  onHello?: (connId: number, clientType: ClientType) => void;
  onTilt?: (connId: number, msg: TiltMsg) => void;
  onTurn?: (connId: number, msg: TurnMsg) => void;
  onRestart?: (connId: number) => void;
  onDisconnect?: (connId: number, clientType: 'unknown' | ClientType) => void;
}

export class WsHub {
  private wss: WebSocketServer;
  private connections = new Map<number, ConnectionState>();
  private nextId = 1;
  private welcomeJson: string;
  private maxBufferedAmount: number;
  private onProtocolError: ((connId: number, message: string) => void) | null;
  private handlers: WsHubHandlers | null;

  constructor(
    httpServer: Server,
    welcome: WelcomeMsg,
    options: WsHubOptions = {},
    handlers?: WsHubHandlers
  ) {
    this.maxBufferedAmount = options.maxBufferedAmount ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.onProtocolError = options.onProtocolError ?? null;
    this.wss = new WebSocketServer({
      server: httpServer,
      maxPayload: options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES
    });
    this.welcomeJson = JSON.stringify(welcome);
    this.handlers = handlers ?? null;
    this.wss.on('connection', (socket) => this.handleConnection(socket));
  }

  setHandlers(handlers: WsHubHandlers): void {
    this.handlers = handlers;
  }

  getClientCount(): number {
    return this.connections.size;
  }

  hasFrameRecipients(): boolean {
    for (const state of this.connections.values()) {
      if (state.clientType !== 'unknown') return true;
    }
    return false;
  }

  closeAll(): void {
    for (const state of this.connections.values()) {
      state.socket.close();
    }
    this.connections.clear();
    this.wss.close();
  }

  broadcastFrame(buffer: Uint8Array): void {
    for (const state of this.connections.values()) {
      if (state.clientType === 'unknown') continue;
      if (!this.isWritable(state)) continue;
      state.socket.send(buffer, { binary: true });
    }
  }

  broadcastStatus(status: StatusMsg): void {
    const payload = JSON.stringify(status);
    for (const state of this.connections.values()) {
      if (state.clientType === 'unknown') continue;
      if (!this.isWritable(state)) continue;
      state.socket.send(payload);
    }
  }

  sendJsonTo(connId: number, payload: ServerMessage): void {
    const state = this.connections.get(connId);
    if (!state || !this.isWritable(state)) return;
    state.socket.send(JSON.stringify(payload));
  }

  private isWritable(state: ConnectionState): boolean {
    if (state.socket.readyState !== WebSocket.OPEN) return false;
    return state.socket.bufferedAmount <= this.maxBufferedAmount;
  }

  private handleConnection(socket: WebSocket): void {
    const state: ConnectionState = {
      id: this.nextId++,
      socket,
      clientType: 'unknown'
    };
    this.connections.set(state.id, state);
    socket.on('message', (data, isBinary) => this.handleMessage(state, data, isBinary));
    // Oversized payloads surface here; ws closes the socket with 1009 itself.
    socket.on('error', (err) => this.onProtocolError?.(state.id, err.message));
    socket.on('close', () => {
      if (!this.connections.delete(state.id)) return;
      this.handlers?.onDisconnect?.(state.id, state.clientType);
    });
  }

  private handleMessage(state: ConnectionState, data: RawData, isBinary: boolean): void {
    if (isBinary) {
      this.protocolError(state, 'binary messages are not supported');
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(payloadToText(data));
    } catch {
      this.protocolError(state, 'invalid JSON');
      return;
    }
    const msg = parseClientMessage(parsed);
    if (!msg) {
      this.protocolError(state, 'invalid message');
      return;
    }
    if (msg.type === 'ping') return;
    if (msg.type === 'hello') {
      if (state.clientType !== 'unknown') {
        this.protocolError(state, 'duplicate hello');
        return;
      }
      state.clientType = msg.clientType;
      state.socket.send(this.welcomeJson);
      this.handlers?.onHello?.(state.id, msg.clientType);
      return;
    }
    if (state.clientType === 'unknown') {
      this.protocolError(state, 'hello required first');
      return;
    }
    if (state.clientType !== 'controller') {
      this.protocolError(state, `${msg.type} requires a controller`);
      return;
    }
    switch (msg.type) {
      case 'tilt':
        this.handlers?.onTilt?.(state.id, msg);
        return;
      case 'turn':
        this.handlers?.onTurn?.(state.id, msg);
        return;
      case 'restart':
        this.handlers?.onRestart?.(state.id);
        return;
    }
  }

  private protocolError(state: ConnectionState, message: string): void {
    this.onProtocolError?.(state.id, message);
    if (state.socket.readyState === WebSocket.OPEN) {
      state.socket.send(JSON.stringify({ type: 'error', message }));
    }
    state.socket.close(1008, message);
  }
}

function payloadToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}
