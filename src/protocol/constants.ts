/** Number of drives addressable by the FDC+ serial protocol session. */
export const MAX_DRIVE = 4;
/** Wire value of the drive byte when no drive is selected. */
export const NO_DRIVE = 0xff;

/** Size of every command/response frame on the wire. */
export const FRAME_SIZE = 10;
/** Bytes covered by the frame checksum (tag + two parameter words). */
export const FRAME_CHECKSUM_SPAN = 8;
/** Length of the ASCII command tag at the start of each frame. */
export const TAG_LENGTH = 4;
/** Size of the little-endian checksum trailer after a block of track data. */
export const TRACK_CHECKSUM_SIZE = 2;

/** Track field occupies bits 0..11 of READ/WRIT parameter 1. */
export const TRACK_FIELD_MASK = 0x0fff;
/** Drive number sits in the high nibble of READ/WRIT parameter 1. */
export const DRIVE_FIELD_SHIFT = 12;

/** Server response codes carried in field 1 of WRIT and WSTA responses. */
export const RESPONSE_CODE = {
  OK: 0x0000,
  NOT_READY: 0x0001,
  CHECKSUM_ERROR: 0x0002,
  WRITE_ERROR: 0x0003
} as const;

/** Serial rates the FDC+ can run mode 6/7 at; 403.2K is the most accurate. */
export const BAUD_RATES = [230400, 403200, 460800] as const;
/** 230.4K is available on nearly every PC serial port. */
export const DEFAULT_BAUD_RATE = 230400;

/** Per-attempt wait while a complete 10-byte response is expected. */
export const FRAME_TIMEOUT_MS = 500;
/** Per-attempt wait once a continuous track transfer is under way. */
export const DATA_TIMEOUT_MS = 100;

/** The FDC issues STAT about ten times per second; polling never goes faster. */
export const MIN_STAT_INTERVAL_MS = 100;
