import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import { createServer, Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import {
  ComplianceViolationError,
  NotFoundError,
  UnsupportedCommandError,
  ValidationError,
  errorMessage,
} from '../core/errors';
import { AgentCommunicationBus } from '../messages/bus/AgentCommunicationBus';
import { ApprovalService } from '../validation/approval/ApprovalService';
import { LogAggregator, MetricsCollector } from '../monitoring/core/Monitoring';
import { CommandDispatcher } from './commands';

const BROADCAST_EVENTS = ['request:routed', 'request:failed', 'workflow:completed', 'workflow:failed'] as const;

export interface ErrorBody {
  error: string;
  type: string;
  details?: unknown;
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof UnsupportedCommandError || error instanceof ValidationError) {
    return { status: 400, body: { error: error.message, type: error.name } };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: error.message, type: error.name } };
  }
  if (error instanceof ComplianceViolationError) {
    return { status: 422, body: { error: error.message, type: error.name, details: error.result } };
  }
  return { status: 500, body: { error: errorMessage(error), type: 'InternalError' } };
}

export class APIServer {
  private app = express();
  private server: Server;
  private wss: WebSocketServer;

  constructor(
    private dispatcher: CommandDispatcher,
    private bus: AgentCommunicationBus,
    private approvals: ApprovalService,
    private metrics: MetricsCollector,
    private logs: LogAggregator,
  ) {
    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupWebSocket();
  }

  listen(port: number): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(port, () => {
        this.logs.info(`API server running on port ${port}`);
        resolve();
      });
    });
  }

  close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    this.wss.close();
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        const duration = Date.now() - start;
        this.metrics.incrementCounter('http_requests_total', { method: req.method, status: res.statusCode.toString() });
        this.metrics.recordHistogram('http_request_duration_ms', duration, { method: req.method });
      });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (req, res) => res.json({ status: 'ok', bus: this.bus.isRunning() ? 'running' : 'stopped' }));

    this.command('get', '/api/agents', () => ({ type: 'get_capabilities' }));
    this.command('get', '/api/agents/health', () => ({ type: 'get_health' }));
    this.command('post', '/api/requests', (req) => ({ type: 'route', request: req.body }));
    this.command('post', '/api/workflows/:id', (req) => ({
      type: 'execute_workflow',
      workflowId: req.params.id,
      request: req.body,
    }));
    this.command('get', '/api/workflows/:id', (req) => ({ type: 'get_workflow_state', workflowId: req.params.id }));
    this.command('put', '/api/orchestration-method', (req) => ({
      type: 'set_orchestration_method',
      method: req.body?.method,
    }));

    this.command('post', '/api/validation/actions', (req) => ({ type: 'validate_action', request: req.body }));
    this.command('post', '/api/validation/actions/batch', (req) => ({
      type: 'validate_actions',
      requests: req.body?.requests,
    }));
    this.command('get', '/api/validation/audit', (req) => ({
      type: 'get_audit_log',
      query: {
        contactId: queryString(req, 'contactId'),
        actionType: queryString(req, 'actionType'),
        startDate: queryString(req, 'startDate'),
        endDate: queryString(req, 'endDate'),
      },
    }));
    this.command('get', '/api/validation/config', () => ({ type: 'get_validation_config' }));
    this.command('patch', '/api/validation/config', (req) => ({ type: 'update_validation_config', patch: req.body }));

    this.command('get', '/api/approvals', (req) => ({
      type: 'get_pending_approvals',
      userId: queryString(req, 'userId'),
      includeExpired: queryString(req, 'includeExpired') === 'true',
    }));
    this.command('post', '/api/approvals/:id/response', (req) => ({
      type: 'respond_to_approval',
      response: { ...req.body, approvalRequestId: req.params.id },
    }));

    this.command('post', '/api/commands', (req) => req.body);

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.respondWithError(res, error);
    });
  }

  private command(
    method: 'get' | 'post' | 'put' | 'patch',
    path: string,
    build: (req: Request) => unknown,
  ): void {
    this.app[method](path, async (req: Request, res: Response) => {
      try {
        const result = await this.dispatcher.dispatch(build(req));
        res.json(result);
      } catch (error) {
        this.respondWithError(res, error);
      }
    });
  }

  private respondWithError(res: Response, error: unknown): void {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      this.logs.error('Request failed: ' + body.error);
    }
    res.status(status).json(body);
  }

  private setupWebSocket(): void {
    for (const event of BROADCAST_EVENTS) {
      this.bus.on(event, (payload: unknown) => this.broadcast({ type: event, data: payload }));
    }
    this.approvals.on('approval:requested', (payload: unknown) => this.broadcast({ type: 'approval:requested', data: payload }));

    this.wss.on('connection', (ws) => {
      ws.on('message', (message) => {
        void this.handleWebSocketMessage(ws, message.toString());
      });
      ws.send(JSON.stringify({ type: 'connected', message: 'Agent control plane' }));
    });
  }

  private async handleWebSocketMessage(ws: WebSocket, message: string): Promise<void> {
    let data: unknown;
    try {
      data = JSON.parse(message);
    } catch (error) {
      ws.send(JSON.stringify({ type: 'error', error: 'Message is not valid JSON' }));
      return;
    }

    try {
      const result = await this.dispatcher.dispatch(data);
      ws.send(JSON.stringify({ type: 'result', data: result }));
    } catch (error) {
      const { body } = toErrorResponse(error);
      ws.send(JSON.stringify({ ...body }));
    }
  }

  private broadcast(data: unknown): void {
    const message = JSON.stringify(data);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    }
  }
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}
