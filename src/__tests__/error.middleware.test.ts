/**
 * =============================================================================
 * ERROR MIDDLEWARE
 * =============================================================================
 */

import express, { Express } from 'express';
import request from 'supertest';
import { ErrorCode } from '../core/constants';
import { AppError, JobNotFoundError } from '../core/errors/AppError';
import { errorHandler } from '../shared/middleware/error.middleware';
import { logger } from '../shared/services/logger.service';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function failingApp(error: Error): Express {
  const app = express();
  app.get('/boom', () => {
    throw error;
  });
  app.use(errorHandler);
  return app;
}

describe('errorHandler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('logs client errors as warnings and answers with their status', async () => {
    const res = await request(failingApp(new JobNotFoundError('job-1'))).get('/boom');

    expect(res.status).toBe(404);
    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe(ErrorCode.JOB_NOT_FOUND);
    expect(logger.warn).toHaveBeenCalledWith('Request error', expect.objectContaining({
      code: ErrorCode.JOB_NOT_FOUND,
      path: '/boom',
      method: 'GET',
    }));
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs server-side application errors as errors', async () => {
    const res = await request(failingApp(new AppError('store offline', 503, ErrorCode.SERVICE_UNAVAILABLE))).get('/boom');

    expect(res.status).toBe(503);
    expect(res.body.error).toEqual({ code: ErrorCode.SERVICE_UNAVAILABLE, message: 'store offline' });
    expect(logger.error).toHaveBeenCalledWith('Request error', {
      code: ErrorCode.SERVICE_UNAVAILABLE,
      error: 'store offline',
      path: '/boom',
      method: 'GET',
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('returns the message of unexpected errors outside production', async () => {
    const res = await request(failingApp(new Error('kaboom'))).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({ code: ErrorCode.INTERNAL_ERROR, message: 'kaboom' });
  });
});
