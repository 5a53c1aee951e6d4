import { Transform, TransformCallback } from "stream";
import { StreamError } from "@core/errors";
import {
  STREAM_MAX_HEAD_BYTES,
  STREAM_RESPONSE_PREAMBLE,
} from "@core/constants";

/**
 * Transport shim for the hotspot's GPS endpoint.
 *
 * The device answers the request with a bare byte stream and no response
 * head (HTTP/0.9 style). This transform injects a fabricated
 * `200 OK` head ahead of the first chunk read from the socket and passes
 * every byte after it through unmodified.
 */
export class Http09ResponseShim extends Transform {
  private injected = false;

  constructor(private readonly preamble: string = STREAM_RESPONSE_PREAMBLE) {
    super();
  }

  _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    if (!this.injected) {
      this.injected = true;
      this.push(Buffer.from(this.preamble, "latin1"));
    }
    callback(null, chunk);
  }
}

/**
 * Consumes an HTTP/1.x response head and emits only the body.
 *
 * Fails with STREAM_BAD_RESPONSE when the status is not 200, the status
 * line is not HTTP/1.x, the head grows past `maxHeadBytes`, or the stream
 * ends before the head is complete.
 */
export class HttpHeadParser extends Transform {
  private head: Buffer = Buffer.alloc(0);
  private bodyStarted = false;

  constructor(private readonly maxHeadBytes: number = STREAM_MAX_HEAD_BYTES) {
    super();
  }

  _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    if (this.bodyStarted) {
      callback(null, chunk);
      return;
    }

    this.head = Buffer.concat([this.head, chunk]);
    const headEnd = this.head.indexOf("\r\n\r\n");
    if (headEnd === -1) {
      if (this.head.length > this.maxHeadBytes) {
        callback(StreamError.badResponse("response head too large"));
        return;
      }
      callback();
      return;
    }

    const statusLine = this.head
      .subarray(0, this.head.indexOf("\r\n"))
      .toString("latin1");
    const match = /^HTTP\/1\.[01] (\d{3})\b/.exec(statusLine);
    if (!match) {
      callback(StreamError.badResponse(`invalid status line "${statusLine}"`));
      return;
    }
    if (match[1] !== "200") {
      callback(StreamError.badResponse(`status ${match[1]}`));
      return;
    }

    const body = this.head.subarray(headEnd + 4);
    this.head = Buffer.alloc(0);
    this.bodyStarted = true;
    callback(null, body.length > 0 ? body : undefined);
  }

  _flush(callback: TransformCallback): void {
    if (!this.bodyStarted) {
      callback(
        StreamError.badResponse("connection closed before response head"),
      );
      return;
    }
    callback();
  }
}
