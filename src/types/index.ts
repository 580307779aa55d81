export {
  type ReadFileRequest,
  type SaveFileRequest,
  type IsMediaFileRequest,
  type LoadEmbeddedArtRequest,
  type ReadCloudFileRequest,
  type NetworkStatisticsRequest,
  type ReadFileResponse,
  type SuccessResponse,
  type LoadEmbeddedArtResponse,
  type NetworkStatisticsEntry,
  type NetworkStatisticsResponse,
  type Operations,
  type OperationName,
  type RequestOf,
  type ResponseOf,
  type ReadyFrame,
  type GoodbyeFrame,
  type ErrorFrame,
  OPERATION_NAMES,
  isOperationName,
  requestField,
  responseField,
} from './protocol.js';

export {
  type FileType,
  type SongMetadata,
  type WireSongMetadata,
  type Int64,
  type Int64Field,
  FILE_TYPES,
  INT64_FIELDS,
  emptySong,
  songFromWire,
  songToWire,
} from './song.js';

export { ErrorCode, type ErrorCodeValue, FATAL_CODES } from './errors.js';

export { SONG_METADATA_SCHEMA, REQUEST_SCHEMAS, RESPONSE_SCHEMAS } from './message-schema.js';

export {
  EMPTY_DELIMITER,
  workerKey,
  workerIdentity,
  type WorkerFrameHandler,
  type PoolFrameHandler,
  type RouterSocket,
  type DealerSocket,
  type SocketFactory,
} from './socket.js';

export {
  type PoolConfig,
  type LoggingConfig,
  type TagpoolConfig,
  DEFAULT_CONFIG,
  resolveHome,
  parseConfig,
} from './config.js';
