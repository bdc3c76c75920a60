// HTTP utilities
export {
  createTransport,
  buildRequestHeaders,
  nextRedirect,
  readBody,
  releaseBody,
  formatHttpError,
  sleep,
} from './http';
export type { HopRequest, TransportConfig } from './http';

// Connection agents
export { createTimedAgents, armPhaseTimeout, ConnectTimeoutError } from './agents';
export type { ConnectPhase, ConnectTimeouts, TimedAgents } from './agents';
