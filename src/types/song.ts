/**
 * Song metadata record exchanged with tag-reader workers.
 *
 * Field names follow the worker protocol definition. On the wire every
 * field is optional (default-valued fields may be omitted); inside the
 * client a record is always complete.
 */

// ---------------------------------------------------------------------------
// File type
// ---------------------------------------------------------------------------

/** Container/codec classification reported by the worker. */
export type FileType =
  | 'UNKNOWN'
  | 'ASF'
  | 'FLAC'
  | 'MP4'
  | 'MPC'
  | 'MPEG'
  | 'OGGFLAC'
  | 'OGGSPEEX'
  | 'OGGVORBIS'
  | 'OGGOPUS'
  | 'AIFF'
  | 'WAV'
  | 'WAVPACK'
  | 'TRUEAUDIO'
  | 'APE'
  | 'DSF'
  | 'DSDIFF'
  | 'SPC'
  | 'VGM'
  | 'CDDA'
  | 'STREAM';

export const FILE_TYPES: readonly FileType[] = [
  'UNKNOWN',
  'ASF',
  'FLAC',
  'MP4',
  'MPC',
  'MPEG',
  'OGGFLAC',
  'OGGSPEEX',
  'OGGVORBIS',
  'OGGOPUS',
  'AIFF',
  'WAV',
  'WAVPACK',
  'TRUEAUDIO',
  'APE',
  'DSF',
  'DSDIFF',
  'SPC',
  'VGM',
  'CDDA',
  'STREAM',
];

// ---------------------------------------------------------------------------
// SongMetadata
// ---------------------------------------------------------------------------

export interface SongMetadata {
  /** False when the worker could not read the file. */
  valid: boolean;
  title: string;
  album: string;
  artist: string;
  albumartist: string;
  composer: string;
  performer: string;
  grouping: string;
  lyrics: string;
  genre: string;
  comment: string;
  track: number;
  disc: number;
  bpm: number;
  year: number;
  originalyear: number;
  compilation: boolean;
  /** 0.0 – 1.0, or -1 when unrated. */
  rating: number;
  length_nanosec: number;
  bitrate: number;
  samplerate: number;
  /** Location of the file, normally a `file:` URL. */
  url: string;
  basefilename: string;
  /** Seconds since the epoch. */
  mtime: number;
  ctime: number;
  filesize: number;
  suspicious_tags: boolean;
  art_automatic: string;
  type: FileType;
  playcount: number;
  skipcount: number;
  lastplayed: number;
  score: number;
}

/**
 * A 64-bit integer as JSON carries it. The protobuf JSON mapping writes
 * int64 as a decimal string; plain numbers are accepted as well.
 */
export type Int64 = number | string;

/** Fields declared int64 by the worker protocol. */
export const INT64_FIELDS = ['length_nanosec', 'mtime', 'ctime', 'filesize', 'lastplayed'] as const;

export type Int64Field = (typeof INT64_FIELDS)[number];

/** Wire form: the worker may omit any field, and int64 fields may be strings. */
export type WireSongMetadata = {
  [K in keyof SongMetadata]?: K extends Int64Field ? Int64 : SongMetadata[K];
};

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/** The neutral record returned when a read fails. */
export function emptySong(): SongMetadata {
  return {
    valid: false,
    title: '',
    album: '',
    artist: '',
    albumartist: '',
    composer: '',
    performer: '',
    grouping: '',
    lyrics: '',
    genre: '',
    comment: '',
    track: -1,
    disc: -1,
    bpm: -1,
    year: -1,
    originalyear: -1,
    compilation: false,
    rating: -1,
    length_nanosec: -1,
    bitrate: -1,
    samplerate: -1,
    url: '',
    basefilename: '',
    mtime: -1,
    ctime: -1,
    filesize: -1,
    suspicious_tags: false,
    art_automatic: '',
    type: 'UNKNOWN',
    playcount: 0,
    skipcount: 0,
    lastplayed: -1,
    score: 0,
  };
}

/** Complete a wire record with neutral values for the omitted fields. */
export function songFromWire(wire: WireSongMetadata | undefined): SongMetadata {
  const source: WireSongMetadata = wire ?? {};
  const { length_nanosec, mtime, ctime, filesize, lastplayed, ...rest } = source;
  const song: SongMetadata = { ...emptySong(), ...rest };

  const int64s = { length_nanosec, mtime, ctime, filesize, lastplayed };
  for (const field of INT64_FIELDS) {
    const value = int64s[field];
    if (value !== undefined) {
      song[field] = Number(value);
    }
  }
  return song;
}

/** Owned copy for a request payload. */
export function songToWire(song: SongMetadata): WireSongMetadata {
  return { ...song };
}
