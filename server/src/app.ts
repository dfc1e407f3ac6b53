import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { EXPENSE_CATEGORIES } from '../../src/domain/types.js';
import {
  ValidationError,
  parseExpenseMap,
  parseIncome,
  parseTransactionInput,
} from '../../src/domain/validation.js';
import { PROFILES, TIPS, isProfileType, isQuickQuestionKind, isTipTopic } from '../../src/api/advisor.js';
import {
  addTransaction,
  ask,
  askQuickQuestion,
  budgetSummary,
  clearMessages,
  spendingInsights,
  withBudget,
  withProfile,
  type ChatTurn,
  type Session,
} from '../../src/api/session.js';
import {
  toApiCharts,
  toApiInsights,
  toApiSession,
  toApiSummary,
  toApiTransaction,
  type ApiChatTurn,
} from '../../src/api/wire.js';
import { SessionStore } from './sessionStore.js';
import type { ServerConfig } from './config.js';

type AppOptions = Pick<ServerConfig, 'corsOrigin'>;

function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  console.error(`[Sessions] Error ${action}:`, error);
  res.status(500).json({ error: `Failed to ${action}` });
}

/** 4xx status carried by a body-parser error, if any */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/** Read one field off a JSON body without trusting its shape */
function field(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.entries(body).find(([k]) => k === key)?.[1];
}

function chatTurn(turn: ChatTurn): ApiChatTurn {
  return { reply: turn.reply, messages: [...turn.session.messages] };
}

export function createApp(store: SessionStore = new SessionStore(), options: AppOptions = { corsOrigin: '*' }) {
  const app = express();

  app.use(cors({ origin: options.corsOrigin }));
  app.use(express.json());

  /** Look up the session named in the path, or answer 404 */
  function loadSession(req: Request<{ id: string }>, res: Response): Session | undefined {
    const session = store.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
    }
    return session;
  }

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // --- Reference data ---

  app.get('/profiles', (_req, res) => {
    res.json(PROFILES);
  });

  app.get('/categories', (_req, res) => {
    res.json(EXPENSE_CATEGORIES);
  });

  app.get('/tips/:topic', (req, res) => {
    const { topic } = req.params;
    if (!isTipTopic(topic)) {
      res.status(404).json({ error: `Unknown tip topic: ${topic}` });
      return;
    }
    res.json({ topic, tips: TIPS[topic] });
  });

  // --- Sessions ---

  // POST /sessions - Start a new session
  app.post('/sessions', (_req, res) => {
    try {
      const session = store.create();
      console.log(`[Sessions] Created ${session.id} (${store.size} active)`);
      res.status(201).json(toApiSession(session));
    } catch (error) {
      sendError(res, error, 'create session');
    }
  });

  app.get('/sessions/:id', (req, res) => {
    const session = loadSession(req, res);
    if (!session) return;
    res.json(toApiSession(session));
  });

  app.delete('/sessions/:id', (req, res) => {
    if (!store.delete(req.params.id)) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json({ ok: true });
  });

  // PUT /sessions/:id/profile - Select persona
  app.put('/sessions/:id/profile', (req, res) => {
    try {
      const session = loadSession(req, res);
      if (!session) return;
      const profileType = field(req.body, 'profile_type');
      if (!isProfileType(profileType)) {
        throw new ValidationError(`profile_type must be one of ${Object.keys(PROFILES).join(', ')}`);
      }
      res.json(toApiSession(store.save(withProfile(session, profileType))));
    } catch (error) {
      sendError(res, error, 'update profile');
    }
  });

  // PUT /sessions/:id/budget - Replace income and the whole expense map
  app.put('/sessions/:id/budget', (req, res) => {
    try {
      const session = loadSession(req, res);
      if (!session) return;
      const income = parseIncome(field(req.body, 'income'));
      const expenses = parseExpenseMap(field(req.body, 'expenses') ?? {});
      const next = withBudget(session, income, expenses);
      res.json(toApiSession(store.save(next)));
    } catch (error) {
      sendError(res, error, 'update budget');
    }
  });

  // --- Transactions ---

  app.get('/sessions/:id/transactions', (req, res) => {
    const session = loadSession(req, res);
    if (!session) return;
    res.json(session.transactions.map(toApiTransaction));
  });

  // POST /sessions/:id/transactions - Append one transaction
  app.post('/sessions/:id/transactions', (req, res) => {
    try {
      const session = loadSession(req, res);
      if (!session) return;
      const txn = parseTransactionInput(req.body);
      store.save(addTransaction(session, txn));
      res.status(201).json(toApiTransaction(txn));
    } catch (error) {
      sendError(res, error, 'create transaction');
    }
  });

  // --- Derived views ---

  // GET /sessions/:id/insights - Spending analysis over the transaction log
  app.get('/sessions/:id/insights', (req, res) => {
    try {
      const session = loadSession(req, res);
      if (!session) return;
      res.json(toApiInsights(spendingInsights(session)));
    } catch (error) {
      sendError(res, error, 'compute insights');
    }
  });

  // GET /sessions/:id/summary - Monthly budget summary
  app.get('/sessions/:id/summary', (req, res) => {
    try {
      const session = loadSession(req, res);
      if (!session) return;
      res.json(toApiSummary(budgetSummary(session), session.expenses));
    } catch (error) {
      sendError(res, error, 'compute summary');
    }
  });

  app.get('/sessions/:id/charts', (req, res) => {
    try {
      const session = loadSession(req, res);
      if (!session) return;
      res.json(toApiCharts(session.expenses, budgetSummary(session), spendingInsights(session)));
    } catch (error) {
      sendError(res, error, 'compute charts');
    }
  });

  // --- Chat ---

  app.get('/sessions/:id/messages', (req, res) => {
    const session = loadSession(req, res);
    if (!session) return;
    res.json(session.messages);
  });

  app.delete('/sessions/:id/messages', (req, res) => {
    const session = loadSession(req, res);
    if (!session) return;
    store.save(clearMessages(session));
    res.json({ ok: true });
  });

  // POST /sessions/:id/chat - Ask a free-text question
  app.post('/sessions/:id/chat', (req, res) => {
    try {
      const session = loadSession(req, res);
      if (!session) return;
      const message = field(req.body, 'message');
      if (typeof message !== 'string' || !message.trim()) {
        throw new ValidationError('message must be a non-empty string');
      }
      const turn = ask(session, message.trim());
      store.save(turn.session);
      res.json(chatTurn(turn));
    } catch (error) {
      sendError(res, error, 'answer message');
    }
  });

  // POST /sessions/:id/chat/quick - One-tap tip list
  app.post('/sessions/:id/chat/quick', (req, res) => {
    try {
      const session = loadSession(req, res);
      if (!session) return;
      const topic = field(req.body, 'topic');
      if (!isQuickQuestionKind(topic)) {
        throw new ValidationError('topic must be one of budgeting, savings, investments');
      }
      const turn = askQuickQuestion(session, topic);
      store.save(turn.session);
      res.json(chatTurn(turn));
    } catch (error) {
      sendError(res, error, 'answer quick question');
    }
  });

  // Body errors surface here from express.json(): bad JSON, too large, bad charset
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON' });
      return;
    }
    const status = clientErrorStatus(error);
    if (status !== null && error instanceof Error) {
      res.status(status).json({ error: error.message });
      return;
    }
    sendError(res, error, 'handle request');
  });

  return app;
}
