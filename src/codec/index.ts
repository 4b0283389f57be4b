export {
  ValueType,
  MESSAGE_KEY_SIZE,
  REGULAR_MESSAGE,
  MessageFlags,
  MessageDataFlags,
  ForwardInfoFlags,
  type TaggedObject,
  type TaggedValue,
  type TaggedValueOf,
  type TaggedField,
  type MessageKey,
  type MessageValue,
  type ForwardInfo,
  type Peer,
} from './types.js';

export { ByteReader } from './reader.js';
export { ByteWriter, TaggedStreamEncoder } from './writer.js';

export {
  readValue,
  skipValue,
  readField,
  decodeAll,
  seekField,
  getString,
  getInt32,
  getInt64,
  getObject,
} from './tagged.js';

export {
  PEER_ROOT_KEY,
  EMPTY_PEER,
  parseMessageKey,
  encodeMessageKey,
  peerKeyPrefix,
  readForwardInfo,
  parseMessageValue,
  encodeMessageValue,
  parsePeer,
  encodePeer,
  peerDisplayName,
  type MessageValueInit,
} from './records.js';
