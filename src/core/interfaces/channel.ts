/**
 * Channel interface.
 */

/**
 * Interface for user-facing channel implementations.
 */
export interface IChannel {
  /**
   * Channel name identifier.
   */
  readonly name: string;

  /**
   * Whether the channel is currently running.
   */
  readonly isRunning: boolean;

  /**
   * Start the channel and begin accepting requests.
   */
  start(): Promise<void>;

  /**
   * Stop the channel and clean up resources.
   */
  stop(): Promise<void>;
}
