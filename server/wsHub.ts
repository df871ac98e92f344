import type { Server } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { parseClientMessage } from './protocol.ts';
import type { InputMsg, ServerMessage, WelcomeMsg } from './protocol.ts';

const DEFAULT_MAX_MESSAGE_BYTES = 4 * 1024;
const DEFAULT_MAX_BUFFERED_BYTES = 512 * 1024;

export interface ConnectionState {
  id: number;
  socket: WebSocket;
  greeted: boolean;
}

export interface WsHubOptions {
  maxMessageBytes?: number;
  maxBufferedAmount?: number;
}

export interface WsHubHandlers {
  onConnect?: (connId: number) => void;
  onInput?: (connId: number, msg: InputMsg) => void;
  onDisconnect?: (connId: number) => void;
}

/** Anything frames can be pushed to. */
export interface FrameSink {
  broadcast(msg: ServerMessage): void;
}

export class WsHub implements FrameSink {
  private wss: WebSocketServer;
  private connections = new Map<number, ConnectionState>();
  private nextId = 1;
  private welcomeJson: string;
  private maxMessageBytes: number;
  private maxBufferedAmount: number;
  private handlers: WsHubHandlers | null;

  constructor(
    httpServer: Server,
    welcome: WelcomeMsg,
    options: WsHubOptions = {},
    handlers?: WsHubHandlers
  ) {
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.maxBufferedAmount = options.maxBufferedAmount ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.wss = new WebSocketServer({
      server: httpServer,
      maxPayload: this.maxMessageBytes
    });
    this.welcomeJson = JSON.stringify(welcome);
    this.handlers = handlers ?? null;
    this.wss.on('connection', (socket) => this.handleConnection(socket));
  }

  setHandlers(handlers: WsHubHandlers): void {
    this.handlers = handlers;
  }

  /** Open connections, greeted or not. */
  getClientCount(): number {
    return this.connections.size;
  }

  closeAll(): void {
    for (const state of this.connections.values()) {
      state.socket.close();
    }
    this.connections.clear();
    this.wss.close();
  }

  /** Send to every greeted client that is not backed up. */
  broadcast(msg: ServerMessage): void {
    const payload = JSON.stringify(msg);
    for (const state of this.connections.values()) {
      if (!state.greeted) continue;
      if (state.socket.readyState !== WebSocket.OPEN) continue;
      if (state.socket.bufferedAmount > this.maxBufferedAmount) continue;
      state.socket.send(payload);
    }
  }

  private handleConnection(socket: WebSocket): void {
    const state: ConnectionState = {
      id: this.nextId++,
      socket,
      greeted: false
    };
    this.connections.set(state.id, state);
    socket.on('message', (data, isBinary) => this.handleMessage(state, data, isBinary));
    socket.on('close', () => {
      this.connections.delete(state.id);
      this.handlers?.onDisconnect?.(state.id);
    });
  }

  private handleMessage(state: ConnectionState, data: RawData, isBinary: boolean): void {
    const text = payloadToText(data);
    if (Buffer.byteLength(text, 'utf8') > this.maxMessageBytes) {
      this.protocolError(state, 'message too large');
      return;
    }
    if (isBinary) {
      this.protocolError(state, 'binary messages are not supported');
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      this.protocolError(state, 'invalid JSON');
      return;
    }
    const msg = parseClientMessage(parsed);
    if (!msg) {
      this.protocolError(state, 'invalid message');
      return;
    }
    switch (msg.type) {
      case 'hello':
        if (state.greeted) {
          this.protocolError(state, 'duplicate hello');
          return;
        }
        state.greeted = true;
        state.socket.send(this.welcomeJson);
        this.handlers?.onConnect?.(state.id);
        return;
      case 'input':
        if (!state.greeted) {
          this.protocolError(state, 'hello required before input');
          return;
        }
        this.handlers?.onInput?.(state.id, msg);
        return;
      case 'ping':
        return;
    }
  }

  private protocolError(state: ConnectionState, message: string): void {
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
