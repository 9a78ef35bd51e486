import express, { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import cors from 'cors';
import { config } from './core/config';
import { logger } from './core/logger';
import { FormAssistantError, InputError } from './core/errors';
import { formSchema } from './services/schema.service';
import { sessionService } from './services/session.service';
import { isValidSessionId, maskSensitiveData, secureLog } from './utils/security';
import { SessionState, TurnResult } from './types/graph';

export const app = express();

app.use(
  cors({
    origin: '*', // For development; specify your domain in production
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  })
);
app.use(express.json({ limit: '100kb' }));

app.use((req: Request, res: Response, next: NextFunction) => {
  secureLog('Incoming request', { method: req.method, path: req.path, ip: req.ip });
  next();
});

function sessionIdParam(req: Request): string {
  const { sessionId } = req.params;
  if (!isValidSessionId(sessionId)) {
    throw new InputError('Invalid sessionId format');
  }
  return sessionId;
}

function presentSession(session: SessionState) {
  const total = formSchema.fields().length;
  return {
    sessionId: session.sessionId,
    currentField: session.currentField,
    completedFields: session.completedFields,
    fieldValues: session.fieldValues,
    confirmationPending: session.confirmationPending,
    pendingValue: session.confirmationPending ? session.pendingValue : null,
    extractionAttempts: session.extractionAttempts,
    complete: session.complete,
    finalOutput: session.finalOutput,
    messages: session.messages,
    progress: {
      completed: session.completedFields.length,
      total,
      percentage: Math.round((session.completedFields.length / total) * 100),
    },
    updatedAt: session.updatedAt,
  };
}

function presentTurn(result: TurnResult) {
  return {
    success: true,
    data: {
      accepted: result.accepted,
      reply: result.reply,
      error: result.error,
      session: presentSession(result.session),
    },
  };
}

app.get('/health', (req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    sessionStore: config.sessions.store,
  });
});

app.get('/form/schema', (req: Request, res: Response) => {
  res.json({
    success: true,
    data: formSchema.fields().map(field => ({
      name: field.name,
      label: field.label,
      type: field.type,
      description: field.description,
      required: field.required,
      rules: formSchema.describeRules(field.name),
      options: field.constraints.enumValues ?? null,
    })),
  });
});

app.post('/sessions', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const session = await sessionService.create();
    res.status(201).json({ success: true, data: presentSession(session) });
  } catch (error) {
    next(error);
  }
});

app.get('/sessions/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const session = await sessionService.get(sessionIdParam(req));
    res.json({ success: true, data: presentSession(session) });
  } catch (error) {
    next(error);
  }
});

app.post('/sessions/:sessionId/turns', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessionId = sessionIdParam(req);
    const text: unknown = req.body?.text;

    if (typeof text !== 'string') {
      throw new InputError('text is required');
    }

    const result = await sessionService.submitText(sessionId, text);
    res.json(presentTurn(result));
  } catch (error) {
    next(error);
  }
});

app.post('/sessions/:sessionId/capture', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessionId = sessionIdParam(req);
    const { success, text, error } = req.body ?? {};

    if (typeof success !== 'boolean') {
      throw new InputError('success flag is required');
    }

    const result = await sessionService.submitCapture(sessionId, {
      success,
      text: typeof text === 'string' ? text : undefined,
      error: typeof error === 'string' ? error : undefined,
    });
    res.json(presentTurn(result));
  } catch (error) {
    next(error);
  }
});

app.post('/sessions/:sessionId/reset', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const session = await sessionService.reset(sessionIdParam(req));
    res.json({ success: true, data: presentSession(session) });
  } catch (error) {
    next(error);
  }
});

app.delete('/sessions/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
  try {
    await sessionService.remove(sessionIdParam(req));
    res.json({ success: true, message: 'Session deleted successfully' });
  } catch (error) {
    next(error);
  }
});

interface ErrorResponse {
  status: number;
  body: {
    success: false;
    message: string;
    error: { message: string; code: string; details?: Record<string, unknown> };
  };
}

function clientStatusOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Maps a thrown error to the JSON error body. Client errors raised by
 * express middleware (malformed or oversized bodies) keep their 4xx status.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof FormAssistantError) {
    return {
      status: error.statusCode,
      body: {
        success: false,
        message: error.message,
        error: { message: error.message, code: error.code, details: error.details },
      },
    };
  }

  const status = clientStatusOf(error);
  if (status !== null) {
    const message = status === 413 ? 'Request body too large' : 'Malformed request body';
    return {
      status,
      body: { success: false, message, error: { message, code: 'BAD_REQUEST' } },
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      message: 'Internal server error',
      error: { message: 'Internal server error', code: 'INTERNAL_ERROR' },
    },
  };
}

app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
  const { status, body } = toErrorResponse(error);

  secureLog(error.message || 'An error occurred', { stack: error.stack, path: req.path, status }, status < 500 ? 'warn' : 'error');

  res.status(status).json(body);
});

async function connectDatabase() {
  try {
    await mongoose.connect(config.mongodb.uri, {
      dbName: config.mongodb.dbName,
    });
    secureLog('Connected to MongoDB', {
      dbName: config.mongodb.dbName,
      uri: maskSensitiveData(config.mongodb.uri),
    });
  } catch (error) {
    secureLog('MongoDB connection failed', { error: error instanceof Error ? error.message : String(error) }, 'error');
    process.exit(1);
  }
}

async function startServer() {
  if (config.sessions.store === 'mongo') {
    await connectDatabase();
  }

  app.listen(config.server.port, () => {
    logger.info('Form assistant server started', {
      port: config.server.port,
      env: config.server.env,
      sessionStore: config.sessions.store,
      nodeVersion: process.version,
    });
  });
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    secureLog('Failed to start server', { error: error instanceof Error ? error.message : String(error) }, 'error');
    process.exit(1);
  });
}
