/**
 * A recurring background task that runs until the process shuts down
 */
export interface IScheduledTask {
  start(): void;
  stop(): void;
  isRunning(): boolean;
}
