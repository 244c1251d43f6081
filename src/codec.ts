/**
 * Frame codec.
 *
 * A frame is UTF-8 JSON text followed by a single 0x03 byte. There is no
 * length prefix. 0x03 never occurs inside UTF-8 encoded JSON text, so frames
 * are split on that byte before any text decoding happens; a multi-byte
 * character broken across two reads is reassembled before it is decoded.
 */

export const FRAME_TERMINATOR = 0x03;

const TERMINATOR_BUFFER = Buffer.from([FRAME_TERMINATOR]);

/**
 * Encode a value as one frame.
 */
export function encodeFrame(value: unknown): Buffer {
  return Buffer.concat([Buffer.from(JSON.stringify(value), 'utf8'), TERMINATOR_BUFFER]);
}

/**
 * Split newly received bytes into complete frames.
 *
 * @param pending - Bytes left over from previous reads
 * @param chunk - Bytes from the latest read
 * @returns Complete frames (terminator stripped) and the incomplete remainder
 */
export function splitFrames(pending: Buffer, chunk: Buffer): { frames: Buffer[]; rest: Buffer } {
  const data = pending.length > 0 ? Buffer.concat([pending, chunk]) : chunk;
  const frames: Buffer[] = [];

  let start = 0;
  let end = data.indexOf(FRAME_TERMINATOR, start);
  while (end !== -1) {
    frames.push(data.subarray(start, end));
    start = end + 1;
    end = data.indexOf(FRAME_TERMINATOR, start);
  }

  // The remainder outlives this read; detach it from the read buffer.
  return { frames, rest: Buffer.from(data.subarray(start)) };
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode one frame's JSON payload.
 *
 * @throws TypeError if the frame is not valid UTF-8
 * @throws SyntaxError if the frame is not valid JSON
 */
export function decodeFrame(frame: Buffer): unknown {
  const value: unknown = JSON.parse(utf8Decoder.decode(frame));
  return value;
}
