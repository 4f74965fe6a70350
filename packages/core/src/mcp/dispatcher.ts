/**
 * Method dispatcher
 *
 * Routes validated messages to their handlers, enforces the session gate
 * and owns the invocation policy (timeout, cancellation). Every request
 * yields exactly one response; notifications yield none.
 *
 * @internal
 */

import type { HandlerContext } from '../types/public-api.js';
import type { Logger } from '../utils/logger.js';
import type {
  IncomingMessage,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
} from './types.js';
import type { CapabilityRegistries } from './registry.js';
import type { Session } from './session.js';
import { handleInitialize, handleInitialized, type ServerIdentity } from './lifecycle.js';
import { handleToolsList, handleToolsCall } from './tools.js';
import { handleResourcesList, handleResourceTemplatesList, handleResourcesRead } from './resources.js';
import { handlePromptsList, handlePromptsGet } from './prompts.js';
import { Invocation, type InvokeHandler } from './invocation.js';
import { cancelledParamsSchema, parseParams, setLevelParamsSchema } from './params.js';
import { internalError, invalidRequest, methodNotFound, notInitialized, toErrorResponse } from './errors.js';
import { isCapabilityMethod, isNotificationMethod, isRequestMethod } from './methods.js';

export const DEFAULT_HANDLER_TIMEOUT_MS = 30_000;

/** Upper bound on remembered request ids (pending cancellations, answered ids) */
const MAX_REMEMBERED_IDS = 1024;

export interface DispatcherOptions {
  session: Session;
  registries: CapabilityRegistries;
  server: ServerIdentity;
  logger: Logger;
  handlerTimeoutMs?: number;
}

export class Dispatcher {
  private readonly session: Session;
  private readonly registries: CapabilityRegistries;
  private readonly server: ServerIdentity;
  private readonly logger: Logger;
  private readonly handlerTimeoutMs: number;

  private readonly pendingCancellations = new Set<string | number>();
  private readonly answered = new Set<string | number>();
  private inFlight: { id: JsonRpcId; invocation: Invocation<unknown> } | null = null;

  constructor(options: DispatcherOptions) {
    this.session = options.session;
    this.registries = options.registries;
    this.server = options.server;
    this.logger = options.logger;
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? DEFAULT_HANDLER_TIMEOUT_MS;
  }

  /**
   * Handle one validated message
   *
   * @returns The response for a request, null for a notification
   */
  async dispatch(message: IncomingMessage): Promise<JsonRpcResponse | null> {
    if (message.kind === 'notification') {
      try {
        this.handleNotification(message);
      } catch (error) {
        this.logger.error('Notification handling failed', { method: message.method, error });
      }
      return null;
    }

    const { id } = message;
    try {
      const result = await this.route(message);
      return { jsonrpc: '2.0', id, result };
    } catch (error) {
      return toErrorResponse(id, error, this.logger);
    } finally {
      if (id !== null) {
        this.pendingCancellations.delete(id);
        remember(this.answered, id);
      }
    }
  }

  /**
   * Cancel a request by id
   *
   * A request that has not started yet never starts; one whose handler is
   * running stops being waited for. Either way it is still answered.
   * Cancelling an already answered request does nothing.
   */
  cancel(requestId: string | number): void {
    if (this.inFlight && this.inFlight.id === requestId) {
      this.inFlight.invocation.cancel();
      return;
    }
    if (this.answered.has(requestId)) {
      return;
    }
    remember(this.pendingCancellations, requestId);
  }

  private async route(request: JsonRpcRequest): Promise<unknown> {
    const { method, params } = request;

    if (request.id !== null && this.pendingCancellations.has(request.id)) {
      throw internalError('cancelled');
    }

    if (this.session.status === 'closed') {
      throw invalidRequest('session is closed');
    }

    if (!isRequestMethod(method)) {
      throw methodNotFound(method);
    }

    if (isCapabilityMethod(method) && !this.session.isInitialized()) {
      throw notInitialized();
    }

    const invoke = this.invoker(request.id);

    switch (method) {
      case 'initialize': {
        const result = handleInitialize(params, this.session, this.registries, this.server);
        this.logger.info('Session initialized', {
          protocolVersion: result.protocolVersion,
          client: this.peer().name,
        });
        return result;
      }

      case 'ping':
        return {};

      case 'tools/list':
        return handleToolsList(params, this.registries.tools);

      case 'tools/call':
        return handleToolsCall(params, this.registries.tools, invoke);

      case 'resources/list':
        return handleResourcesList(params, this.registries);

      case 'resources/templates/list':
        return handleResourceTemplatesList(params, this.registries);

      case 'resources/read':
        return handleResourcesRead(params, this.registries, invoke);

      case 'prompts/list':
        return handlePromptsList(params, this.registries.prompts);

      case 'prompts/get':
        return handlePromptsGet(params, this.registries.prompts, invoke);

      case 'logging/setLevel': {
        const { level } = parseParams(setLevelParamsSchema, params);
        this.logger.setLevel(level);
        return {};
      }
    }
  }

  private handleNotification(notification: JsonRpcNotification): void {
    const { method, params } = notification;
    if (!isNotificationMethod(method)) {
      this.logger.debug('Ignoring notification', { method });
      return;
    }

    switch (method) {
      case 'notifications/initialized':
      case 'initialized':
        if (!handleInitialized(this.session)) {
          this.logger.warn('Ignoring initialized notification outside an initialized session');
        }
        return;

      case 'notifications/cancelled': {
        const parsed = cancelledParamsSchema.safeParse(params ?? {});
        if (!parsed.success) {
          this.logger.debug('Ignoring malformed cancellation', { params });
          return;
        }
        this.logger.debug('Cancellation requested', {
          requestId: parsed.data.requestId,
          reason: parsed.data.reason,
        });
        this.cancel(parsed.data.requestId);
        return;
      }

      case 'logging/setLevel': {
        const parsed = setLevelParamsSchema.safeParse(params ?? {});
        if (parsed.success && this.session.isInitialized()) {
          this.logger.setLevel(parsed.data.level);
        } else {
          this.logger.debug('Ignoring logging/setLevel notification', { params });
        }
        return;
      }
    }
  }

  private invoker(id: JsonRpcId): InvokeHandler {
    return <T>(scope: string, operation: (ctx: HandlerContext) => Promise<T>): Promise<T> => {
      const invocation = new Invocation<T>(signal =>
        operation({
          requestId: id,
          signal,
          logger: this.logger.child(scope),
          peer: this.peer(),
        })
      );

      this.inFlight = { id, invocation };
      const finish = (): void => {
        if (this.inFlight?.invocation === invocation) {
          this.inFlight = null;
        }
      };

      return invocation.run(this.handlerTimeoutMs).then(
        (value) => {
          finish();
          return value;
        },
        (error: unknown) => {
          finish();
          if (invocation.status === 'timed-out') {
            this.logger.warn('Handler timed out', { id, scope, timeoutMs: this.handlerTimeoutMs });
          }
          throw error;
        }
      );
    };
  }

  private peer(): HandlerContext['peer'] {
    const state = this.session.snapshot();
    return state.status === 'initialized' ? state.peer : { name: '', version: '' };
  }
}

function remember(ids: Set<string | number>, id: string | number): void {
  if (ids.size >= MAX_REMEMBERED_IDS) {
    const [oldest] = ids;
    if (oldest !== undefined) {
      ids.delete(oldest);
    }
  }
  ids.add(id);
}
