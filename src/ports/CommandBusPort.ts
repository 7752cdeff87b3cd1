export type CommandParams = Record<string, unknown>;

export type CommandResult = { kind: 'ok' } | { kind: 'error'; message: string };

/**
 * Host automation command bus. A `kind: 'ok'` result only means the command was
 * accepted; players may still ignore it.
 */
export interface CommandBusPort {
  call(domain: string, action: string, params: CommandParams): Promise<CommandResult>;
}
