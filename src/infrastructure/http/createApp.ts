import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { CreateTransactionSchema, formatZodIssues } from '../../application/dto/CanonicalRowDTO.js';
import {
  CanonicalSchemaError,
  DuplicateTransactionError,
  RowParseError,
} from '../../domain/errors.js';
import { AppContainer } from '../bootstrap/AppContainer.js';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 5 * 1024 * 1024, // 5MB max
  },
  fileFilter: (req, file, cb) => {
    if (file.originalname.toLowerCase().endsWith('.csv')) {
      cb(null, true);
    } else {
      cb(Object.assign(new Error('Only CSV files are accepted.'), { status: 400 }));
    }
  },
});

/** Identity is issued upstream; the API only reads it. */
const callerId = (req: Request): string | null => {
  const header = req.header('x-user-id')?.trim();
  return header ? header : null;
};

const queryInt = (value: unknown, fallback: number): number => {
  const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isNaN(parsed) ? fallback : parsed;
};

const statusOf = (error: unknown): number =>
  typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : 500;

const unauthorized = (res: Response) => res.status(401).json({ error: 'Invalid authentication credentials' });

export const createApp = (container: AppContainer) => {
  const app = express();

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Statement Inbox API',
      version: '0.1.0',
      inbox: container.config.watcher.inboxDir,
      model: container.config.normalizer.model,
    });
  });

  app.post('/api/upload', upload.single('statement'), async (req, res) => {
    const ownerId = callerId(req);
    if (!ownerId) {
      return unauthorized(res);
    }

    if (!req.file) {
      return res.status(400).json({ error: 'No CSV file provided. Please upload a statement.' });
    }

    try {
      const { added, skipped } = await container.importService.importCsv(req.file.buffer.toString('utf8'), {
        ownerId,
        sourceFile: req.file.originalname,
      });

      return res.json({ status: 'success', added, skipped, filename: req.file.originalname });
    } catch (error) {
      if (error instanceof CanonicalSchemaError || error instanceof RowParseError) {
        return res.status(400).json({ error: error.message });
      }

      const message = error instanceof Error ? error.message : 'Unable to import statement';
      container.logger.error('CSV upload error:', error);
      return res.status(500).json({ error: message });
    }
  });

  app.post('/api/transactions', async (req, res) => {
    const ownerId = callerId(req);
    if (!ownerId) {
      return unauthorized(res);
    }

    const parsed = CreateTransactionSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: formatZodIssues(parsed.error) });
    }

    try {
      const transaction = await container.importService.createTransaction(parsed.data, ownerId);
      return res.status(201).json(transaction);
    } catch (error) {
      if (error instanceof DuplicateTransactionError) {
        return res.status(400).json({ error: error.message });
      }

      const message = error instanceof Error ? error.message : 'Unable to create transaction';
      return res.status(500).json({ error: message });
    }
  });

  app.get('/api/transactions', async (req, res) => {
    const ownerId = callerId(req);
    if (!ownerId) {
      return unauthorized(res);
    }

    try {
      const transactions = await container.ledgerService.listTransactions(ownerId, {
        skip: queryInt(req.query.skip, 0),
        limit: queryInt(req.query.limit, 100),
      });
      return res.json(transactions);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unable to load transactions';
      return res.status(500).json({ error: message });
    }
  });

  app.get('/api/transactions/summary', async (req, res) => {
    const ownerId = callerId(req);
    if (!ownerId) {
      return unauthorized(res);
    }

    try {
      return res.json(await container.ledgerService.summarize(ownerId));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unable to summarize transactions';
      return res.status(500).json({ error: message });
    }
  });

  app.get('/api/multipliers', async (req, res) => {
    if (!callerId(req)) {
      return unauthorized(res);
    }

    try {
      return res.json(await container.ledgerService.listMultipliers());
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unable to load multipliers';
      return res.status(500).json({ error: message });
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }

    const message = error instanceof Error ? error.message : 'Unexpected error';
    const status = error instanceof multer.MulterError ? 400 : statusOf(error);
    return res.status(status).json({ error: message });
  });

  return app;
};
