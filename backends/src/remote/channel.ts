export interface ExecuteOptions {
  /**
   * The command may run twice without changing the outcome. Only such
   * commands are resent after a failure that may have reached the engine.
   */
  idempotent?: boolean;
}

/**
 * Carries one textual command to a running engine and returns its reply.
 * Implementations reject with B-coded errors: B001 when the engine cannot be
 * reached, B002 when it refuses the command, B003 on timeout.
 */
export interface CommandChannel {
  execute(command: string, options?: ExecuteOptions): Promise<string>;
}
