import * as fs from 'fs';
import { ContainerError, type ContainerErrorKind } from './errors';

const CHUNK_SIZE = 4 * 1024 * 1024; // 4 MB chunks
const ENVELOPE_MARKER = Buffer.from('\nFrom ');
const FILE_START_MARKER = Buffer.from('From ');

/** Byte range of one raw message, envelope line included. */
interface MessageSpan {
  offset: number;
  length: number;
}

export interface MboxContainer {
  path: string;
  /** File size in bytes */
  size: number;
  /** Number of messages found while indexing */
  count: number;
  /** Raw RFC 822 messages in file order, read one at a time. */
  messages(): Generator<Buffer>;
}

function classifyFsError(err: unknown): ContainerErrorKind {
  const code = err instanceof Error && 'code' in err ? err.code : undefined;
  if (code === 'ENOENT' || code === 'ENOTDIR') return 'not-found';
  if (code === 'EACCES' || code === 'EPERM') return 'permission-denied';
  return 'unreadable';
}

/**
 * Scan the file for envelope lines ("From " at the start of the file or
 * right after a newline). Reads in chunks so large containers never sit
 * in memory; a small overlap catches markers split across chunks.
 */
function scanEnvelopeOffsets(fd: number, fileSize: number): number[] {
  const buf = Buffer.alloc(Math.min(CHUNK_SIZE, Math.max(fileSize, 1)));
  const offsets: number[] = [];
  let filePos = 0;
  let overlap = Buffer.alloc(0);

  while (filePos < fileSize) {
    const bytesRead = fs.readSync(fd, buf, 0, Math.min(buf.length, fileSize - filePos), filePos);
    if (bytesRead === 0) break;
    const chunk = buf.subarray(0, bytesRead);

    if (filePos === 0 && chunk.subarray(0, FILE_START_MARKER.length).equals(FILE_START_MARKER)) {
      offsets.push(0);
    }

    const scanBuf = overlap.length > 0 ? Buffer.concat([overlap, chunk]) : chunk;
    const scanOffset = filePos - overlap.length;
    let idx = scanBuf.indexOf(ENVELOPE_MARKER);
    while (idx !== -1) {
      offsets.push(scanOffset + idx + 1);
      idx = scanBuf.indexOf(ENVELOPE_MARKER, idx + 1);
    }

    const overlapSize = Math.min(ENVELOPE_MARKER.length - 1, bytesRead);
    overlap = Buffer.from(chunk.subarray(bytesRead - overlapSize));
    filePos += bytesRead;
  }

  return offsets;
}

function buildSpans(offsets: number[], fileSize: number): MessageSpan[] {
  // No envelope at all: treat non-empty content as one bare message
  if (offsets.length === 0) {
    return fileSize > 0 ? [{ offset: 0, length: fileSize }] : [];
  }
  return offsets.map((offset, i) => ({
    offset,
    length: (i + 1 < offsets.length ? offsets[i + 1] : fileSize) - offset,
  }));
}

/** Drop the envelope line and the line break that separates messages. */
function stripEnvelope(raw: Buffer, hasEnvelope: boolean): Buffer {
  let start = 0;
  if (hasEnvelope) {
    const newline = raw.indexOf(0x0a);
    start = newline === -1 ? raw.length : newline + 1;
  }
  let end = raw.length;
  if (end > start && raw[end - 1] === 0x0a) {
    end--;
    if (end > start && raw[end - 1] === 0x0d) end--;
  }
  return raw.subarray(start, end);
}

/**
 * Open an mbox container and index it. Any failure here is fatal for the
 * run and surfaces as a ContainerError.
 */
export function openMbox(filePath: string): MboxContainer {
  let fd: number;
  let size: number;
  try {
    const stat = fs.statSync(filePath);
    if (!stat.isFile()) {
      throw new ContainerError('unreadable', filePath);
    }
    fd = fs.openSync(filePath, 'r');
    size = stat.size;
  } catch (err) {
    if (err instanceof ContainerError) throw err;
    throw new ContainerError(classifyFsError(err), filePath, { cause: err });
  }

  let spans: MessageSpan[];
  let hasEnvelopes: boolean;
  try {
    const offsets = scanEnvelopeOffsets(fd, size);
    hasEnvelopes = offsets.length > 0;
    spans = buildSpans(offsets, size);
  } catch (err) {
    throw new ContainerError('unreadable', filePath, { cause: err });
  } finally {
    fs.closeSync(fd);
  }

  return {
    path: filePath,
    size,
    count: spans.length,
    *messages() {
      let readFd: number;
      try {
        readFd = fs.openSync(filePath, 'r');
      } catch (err) {
        throw new ContainerError(classifyFsError(err), filePath, { cause: err });
      }
      try {
        for (const span of spans) {
          const raw = Buffer.alloc(span.length);
          try {
            fs.readSync(readFd, raw, 0, span.length, span.offset);
          } catch (err) {
            throw new ContainerError('unreadable', filePath, { cause: err });
          }
          yield stripEnvelope(raw, hasEnvelopes);
        }
      } finally {
        fs.closeSync(readFd);
      }
    },
  };
}
