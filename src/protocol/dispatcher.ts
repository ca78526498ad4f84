import { z } from 'zod';
import { LATEST_PROTOCOL_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from '@modelcontextprotocol/sdk/types.js';
import type { ToolContext, ToolRegistry } from '../tool-registry.js';
import { DocsError, DocsErrorCode, errorMessage, toDocsError } from '../shared/errors.js';
import { logger } from '../logger.js';
import {
  RequestEnvelopeSchema,
  errorEnvelope,
  readRequestId,
  successEnvelope,
  type RequestEnvelope,
  type RequestId,
  type ResponseEnvelope,
} from './envelope.js';

export const SUPPORTED_METHODS = [
  'initialize',
  'ping',
  'tools/list',
  'tools/call',
  'notifications/initialized',
  'notifications/cancelled',
] as const;

export type SupportedMethod = (typeof SUPPORTED_METHODS)[number];

export interface ServerInfo {
  name: string;
  version: string;
}

export interface DispatcherDeps {
  registry: ToolRegistry;
  context: ToolContext;
  serverInfo: ServerInfo;
}

const InitializeParamsSchema = z
  .object({
    protocolVersion: z.string().optional(),
  })
  .passthrough();

const CallToolParamsSchema = z.object({
  name: z.string().min(1, 'tool name must not be empty'),
  arguments: z.record(z.unknown()).optional(),
});

function isSupportedMethod(method: string): method is SupportedMethod {
  return (SUPPORTED_METHODS as readonly string[]).includes(method);
}

function describeIssues(issues: z.ZodIssue[]): string {
  return issues.map(i => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`).join('; ');
}

/**
 * Turns one decoded message into at most one response envelope.
 *
 * Every failure is converted to an error envelope here; nothing thrown by a
 * tool reaches the transport. Notifications (no `id`) never get a response.
 */
export class RequestDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  handleLine(line: string): ResponseEnvelope | null {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (err) {
      logger.debug({ line }, 'Unparseable message');
      return errorEnvelope(null, new DocsError(DocsErrorCode.PARSE_ERROR, `Parse error: ${errorMessage(err)}`));
    }
    return this.dispatch(message);
  }

  dispatch(message: unknown): ResponseEnvelope | null {
    const envelope = RequestEnvelopeSchema.safeParse(message);
    if (!envelope.success) {
      return errorEnvelope(
        readRequestId(message),
        new DocsError(DocsErrorCode.INVALID_REQUEST, `Invalid request: ${describeIssues(envelope.error.issues)}`)
      );
    }

    const request = envelope.data;
    const { id } = request;
    if (id === undefined) {
      this.notify(request);
      return null;
    }
    return this.respond(id, request);
  }

  private respond(id: RequestId, request: RequestEnvelope): ResponseEnvelope {
    try {
      return successEnvelope(id, this.route(request));
    } catch (err) {
      const error = toDocsError(err);
      this.logFailure(request.method, error);
      return errorEnvelope(id, error);
    }
  }

  private notify(request: RequestEnvelope): void {
    try {
      this.route(request);
    } catch (err) {
      this.logFailure(request.method, toDocsError(err));
    }
  }

  private route(request: RequestEnvelope): unknown {
    const { method, params } = request;
    if (!isSupportedMethod(method)) {
      throw new DocsError(DocsErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`, { method });
    }

    switch (method) {
      case 'initialize':
        return this.initialize(params);
      case 'ping':
        return {};
      case 'tools/list':
        return { tools: this.deps.registry.listTools() };
      case 'tools/call':
        return this.callTool(params);
      case 'notifications/initialized':
        logger.info('Client initialized');
        return {};
      case 'notifications/cancelled':
        // Every call completes before the next line is read, so there is nothing in flight to cancel.
        return {};
      default: {
        const unreachable: never = method;
        throw new DocsError(DocsErrorCode.METHOD_NOT_FOUND, `Method not found: ${String(unreachable)}`);
      }
    }
  }

  private initialize(params: unknown) {
    const parsed = InitializeParamsSchema.safeParse(params ?? {});
    if (!parsed.success) {
      throw new DocsError(
        DocsErrorCode.INVALID_PARAMS,
        `Invalid initialize params: ${describeIssues(parsed.error.issues)}`
      );
    }
    const requested = parsed.data.protocolVersion;
    const protocolVersion =
      requested && SUPPORTED_PROTOCOL_VERSIONS.includes(requested) ? requested : LATEST_PROTOCOL_VERSION;

    return {
      protocolVersion,
      capabilities: { tools: { listChanged: false } },
      serverInfo: this.deps.serverInfo,
    };
  }

  private callTool(params: unknown) {
    if (params === undefined || params === null) {
      throw new DocsError(DocsErrorCode.INVALID_PARAMS, 'Missing params');
    }
    const parsed = CallToolParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new DocsError(
        DocsErrorCode.INVALID_PARAMS,
        `Invalid tools/call params: ${describeIssues(parsed.error.issues)}`,
        { issues: parsed.error.issues }
      );
    }

    const { name, arguments: args } = parsed.data;
    const tool = this.deps.registry.get(name);
    if (!tool) {
      throw new DocsError(DocsErrorCode.TOOL_NOT_FOUND, `Unknown tool: ${name}`, { tool: name });
    }

    const text = tool.invoke(args ?? {}, this.deps.context);
    return { content: [{ type: 'text' as const, text }] };
  }

  private logFailure(method: string, error: DocsError): void {
    if (error.code === DocsErrorCode.INTERNAL_ERROR) {
      logger.error({ method, err: error }, 'Request failed');
    } else {
      logger.debug({ method, code: error.code, message: error.message }, 'Request rejected');
    }
  }
}
