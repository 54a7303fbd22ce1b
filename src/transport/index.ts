export {
  Http2Connector,
  connectTcp,
  dialCandidates,
  formatCandidate,
  resolveCandidates,
  type TcpDialer,
} from './bootstrap.js';
export { parseServerTarget, DEFAULT_CONNECT_PATH, DEFAULT_HTTPS_PORT } from './target.js';
export { ALPN_PROTOCOLS, buildTlsOptions, loadTrustRoots } from './tls.js';
export type {
  FrameStream,
  ProgressLog,
  ServerTarget,
  StreamRequest,
  TransportConnector,
  TransportOptions,
  TransportSession,
} from './types.js';
