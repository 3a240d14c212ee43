/**
 * Request Dispatcher - routes commands to handlers by their `kind` tag
 *
 * Critical Design:
 * - Handlers are typed per kind; a handler's result is CommandResults[kind]
 * - register() is last-write-wins (re-registering replaces the handler)
 * - An unhandled kind fails with UNROUTABLE_COMMAND and is audited
 * - Only own entries of the handler table count; inherited names such as
 *   `toString` are unhandled kinds
 */

import { AuditService } from '../core/index.js';
import { IdentityErrors } from '../utils/errors.js';
import { COMMAND_KINDS } from './commands.js';
import type { Command, CommandHandler, CommandKind, CommandResults } from './commands.js';

type HandlerTable = { [K in CommandKind]?: CommandHandler<K> };

const AUDIT_SOURCE = 'dispatch:registry';

/**
 * Usage:
 * ```typescript
 * const dispatcher = new RequestDispatcher(auditService);
 * dispatcher.register('introspect', async ({ token }) => engine.introspect(token));
 * const result = await dispatcher.dispatch({ kind: 'introspect', token });
 * ```
 */
export class RequestDispatcher {
  private readonly handlers: HandlerTable = {};
  private readonly auditService?: AuditService;

  /**
   * @param auditService - Optional audit service (Null Object Pattern)
   */
  constructor(auditService?: AuditService) {
    this.auditService = auditService;
  }

  register<K extends CommandKind>(kind: K, handler: CommandHandler<K>): void {
    this.handlers[kind] = handler;
  }

  has(kind: CommandKind): boolean {
    return this.handlerFor(kind) !== undefined;
  }

  /**
   * Kinds with a registered handler
   */
  kinds(): CommandKind[] {
    return COMMAND_KINDS.filter((kind) => this.has(kind));
  }

  /**
   * Invoke the handler registered for `command.kind`
   *
   * @throws {IdentityError} UNROUTABLE_COMMAND if no handler is registered
   */
  async dispatch<K extends CommandKind>(command: Command<K>): Promise<CommandResults[K]> {
    const handler = this.handlerFor(command.kind);

    if (!handler) {
      await this.auditService?.log({
        timestamp: new Date(),
        source: AUDIT_SOURCE,
        action: 'dispatch',
        success: false,
        reason: `No handler registered for command: ${command.kind}`,
        error: 'UNROUTABLE_COMMAND',
        metadata: { kind: command.kind, registeredKinds: this.kinds() },
      });
      throw IdentityErrors.UNROUTABLE_COMMAND(command.kind);
    }

    return handler(command);
  }

  private handlerFor<K extends CommandKind>(kind: K): CommandHandler<K> | undefined {
    return Object.hasOwn(this.handlers, kind) ? this.handlers[kind] : undefined;
  }
}
