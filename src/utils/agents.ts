import http from 'http';
import https from 'https';
import net from 'net';

export type ConnectPhase = 'dial' | 'tls handshake';

/**
 * Raised when a connection does not finish dialing or its TLS handshake in time
 */
export class ConnectTimeoutError extends Error {
  readonly code: 'EDIALTIMEOUT' | 'ETLSHANDSHAKETIMEOUT';

  constructor(
    readonly phase: ConnectPhase,
    readonly timeoutMs: number
  ) {
    super(`${phase} timeout of ${timeoutMs}ms exceeded`);
    this.name = 'ConnectTimeoutError';
    this.code = phase === 'dial' ? 'EDIALTIMEOUT' : 'ETLSHANDSHAKETIMEOUT';
  }
}

export interface ConnectTimeouts {
  dialTimeout: number;
  tlsHandshakeTimeout: number;
}

export interface TimedAgents {
  http: http.Agent;
  https: https.Agent;
}

/**
 * Destroy the socket unless `event` fires within `timeoutMs`. 0 disables the timer.
 */
export function armPhaseTimeout(
  socket: net.Socket,
  event: 'connect' | 'secureConnect',
  timeoutMs: number,
  phase: ConnectPhase
): void {
  if (timeoutMs <= 0) {
    return;
  }

  const timer = setTimeout(() => {
    socket.destroy(new ConnectTimeoutError(phase, timeoutMs));
  }, timeoutMs);
  timer.unref();

  const clear = (): void => clearTimeout(timer);
  socket.once(event, clear);
  socket.once('close', clear);
}

// Runs the stock connection factory of `proto` against `agent`
function openSocket(proto: object, agent: object, args: unknown[]): net.Socket {
  const create: unknown = Reflect.get(proto, 'createConnection');
  if (typeof create !== 'function') {
    throw new Error('Agent has no connection factory');
  }

  const socket: unknown = Reflect.apply(create, agent, args);
  if (!(socket instanceof net.Socket)) {
    throw new Error('Agent connection factory did not return a socket');
  }
  return socket;
}

class TimedHttpAgent extends http.Agent {
  private readonly timeouts: ConnectTimeouts;

  constructor(timeouts: ConnectTimeouts, options: http.AgentOptions) {
    super(options);
    this.timeouts = timeouts;
  }

  createConnection(...args: unknown[]): net.Socket {
    const socket = openSocket(http.Agent.prototype, this, args);
    armPhaseTimeout(socket, 'connect', this.timeouts.dialTimeout, 'dial');
    return socket;
  }
}

class TimedHttpsAgent extends https.Agent {
  private readonly timeouts: ConnectTimeouts;

  constructor(timeouts: ConnectTimeouts, options: https.AgentOptions) {
    super(options);
    this.timeouts = timeouts;
  }

  createConnection(...args: unknown[]): net.Socket {
    const socket = openSocket(https.Agent.prototype, this, args);
    armPhaseTimeout(socket, 'connect', this.timeouts.dialTimeout, 'dial');
    // The handshake clock starts once TCP is up
    socket.once('connect', () => {
      armPhaseTimeout(socket, 'secureConnect', this.timeouts.tlsHandshakeTimeout, 'tls handshake');
    });
    return socket;
  }
}

/**
 * Create keep-alive agents that enforce the dial and TLS handshake timeouts
 */
export function createTimedAgents(timeouts: ConnectTimeouts): TimedAgents {
  return {
    http: new TimedHttpAgent(timeouts, { keepAlive: true }),
    https: new TimedHttpsAgent(timeouts, { keepAlive: true }),
  };
}
