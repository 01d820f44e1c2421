import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import type { AppConfig } from '../config/loadConfig.js';
import type { Logger } from '../log/logger.js';
import type { DictationManager } from '../services/DictationManager.js';
import { describeCause, toAppErrorDto } from '../shared/appError.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, type AppErrorDto, type Result } from '../shared/result.js';
import type { TranscriptSegment } from '../types/index.js';

export const DEFAULT_UPLOAD_DIR = path.join(os.tmpdir(), 'holdtalk-uploads');
const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export interface StatusServerDeps {
  manager: Pick<DictationManager, 'getStatus' | 'getHistory' | 'getGesture' | 'transcribeFile'>;
  log: Logger;
  uploadDir?: string;
}

function httpStatusFor(error: AppErrorDto): number {
  switch (error.code) {
    case APP_ERROR.BUSY:
      return 409;
    case APP_ERROR.TIMEOUT:
      return 504;
    case APP_ERROR.TRANSCRIPTION_FAILED:
      return 422;
    default:
      return 500;
  }
}

/**
 * Local read-only view of the listener, plus one-off transcription of an
 * uploaded WAV file. Never injects text.
 */
export function createStatusApp(deps: StatusServerDeps): express.Express {
  const { manager, log } = deps;
  const app = express();

  // Middleware
  app.use(cors());

  // File upload configuration
  const storage = multer.diskStorage({
    destination: deps.uploadDir ?? DEFAULT_UPLOAD_DIR,
    filename: (_req, file, cb) => {
      const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
      const ext = path.extname(file.originalname) || '.wav';
      cb(null, file.fieldname + '-' + uniqueSuffix + ext);
    },
  });

  const upload = multer({
    storage,
    limits: {
      fileSize: MAX_UPLOAD_BYTES,
    },
  });

  /**
   * Health check endpoint
   */
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * Current state of the hold-to-talk machine
   */
  app.get('/api/status', (_req: Request, res: Response) => {
    res.json(manager.getStatus());
  });

  /**
   * Recent gestures, newest first
   */
  app.get('/api/sessions', (_req: Request, res: Response) => {
    res.json(manager.getHistory());
  });

  /**
   * Get gesture by ID
   */
  app.get('/api/sessions/:sessionId', (req: Request, res: Response) => {
    const gesture = manager.getGesture(req.params.sessionId);
    if (!gesture) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json(gesture);
  });

  /**
   * Upload and transcribe a WAV file
   */
  app.post('/api/transcribe', upload.single('audio'), async (req: Request, res: Response) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: 'No audio file provided' });
      return;
    }

    // the upload is gone before the client hears back
    let result: Result<TranscriptSegment[]>;
    try {
      result = await manager.transcribeFile(file.path);
    } catch (error) {
      const dto = toAppErrorDto(error, { code: APP_ERROR.INTERNAL, message: 'Transcription failed' });
      log.error('upload transcription crashed', { cause: dto.cause });
      result = err(dto);
    } finally {
      await fs.promises.rm(file.path, { force: true }).catch((error: unknown) => {
        log.warn('cannot remove upload', { path: file.path, cause: describeCause(error) });
      });
    }

    if (!result.ok) {
      log.warn('upload transcription failed', { code: result.error.code, message: result.error.message, cause: result.error.cause });
      res.status(httpStatusFor(result.error)).json({ error: result.error.message, code: result.error.code });
      return;
    }
    res.json({ segments: result.value.map((s) => s.text) });
  });

  // upload limits and malformed multipart bodies
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      res.status(error.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({ error: error.message });
      return;
    }
    next(error);
  });

  return app;
}

/** Listen on the configured address; resolves once bound. */
export function startStatusServer(
  app: express.Express,
  config: Pick<AppConfig['statusServer'], 'host' | 'port'>,
  log: Logger,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : config.port;
      log.info(`status server running on http://${config.host}:${port}`);
      log.info(`health check: http://${config.host}:${port}/health`);
      resolve(server);
    });
  });
}

export function stopStatusServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
