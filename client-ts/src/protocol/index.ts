export { encodeFrame, encodeHeartbeat, decodeFrame, LF, NULL } from './codec';
export {
  Commands,
  ACCEPT_VERSIONS,
  ACK_MODE,
  connectHeaders,
  subscribeHeaders,
  unsubscribeHeaders,
  sendHeaders,
  parseHeartBeat,
} from './frames';
export type {
  Frame,
  FrameHeaders,
  HeadersInit,
  InboundUnit,
  ClientCommand,
  AckMode,
  ConnectParams,
} from './frames';
