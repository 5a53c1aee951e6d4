/**
 * Stream reader lifecycle. The reader cycles connecting -> streaming ->
 * cooldown -> connecting until stopped.
 */
export enum StreamState {
  IDLE = "idle",
  CONNECTING = "connecting",
  STREAMING = "streaming",
  COOLDOWN = "cooldown",
  STOPPED = "stopped",
}

export type StreamMetrics = {
  /** Non-empty lines read from the device */
  linesReceived: number;
  fragmentsDecoded: number;
  decodeErrors: number;
  /** Connection attempts that reached the streaming state */
  sessions: number;
  /** Sessions that ended with a connect or read failure */
  failures: number;
  lastError?: string;
  lastLineAt?: Date;
};

export type StreamStatus = {
  state: StreamState;
  metrics: StreamMetrics;
};
