/**
 * =============================================================================
 * API RESPONSE BUILDER
 * =============================================================================
 *
 * Standardized response format for all API endpoints.
 *
 * RESPONSE FORMAT:
 * ```json
 * {
 *   "success": true,
 *   "data": { ... },
 *   "message": "Optional success message",
 *   "meta": { "timestamp": "..." }
 * }
 * ```
 *
 * USAGE:
 * ```typescript
 * return ApiResponse.success(res, status);
 * return ApiResponse.accepted(res, { id, 'status-url': url });
 * ```
 *
 * =============================================================================
 */

import { Response } from 'express';
import { HTTP_STATUS } from '../constants';

/**
 * Success response format
 */
export interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
  meta?: ResponseMeta;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  timestamp?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * API Response Builder Class
 */
export class ApiResponse {
  /**
   * 200 OK - Generic success response
   */
  static success<T>(
    res: Response,
    data: T,
    message?: string,
    meta?: Omit<ResponseMeta, 'timestamp'>
  ): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      ...(message && { message }),
      meta: {
        timestamp: new Date().toISOString(),
        ...meta
      }
    };
    return res.status(HTTP_STATUS.OK).json(response);
  }

  /**
   * 202 Accepted - Work was queued (or an earlier result is being returned
   * in place of new work)
   */
  static accepted<T>(
    res: Response,
    data: T,
    message?: string
  ): Response {
    return this.custom(res, HTTP_STATUS.ACCEPTED, data, message);
  }

  /**
   * Success with custom status code
   */
  static custom<T>(
    res: Response,
    statusCode: number,
    data: T,
    message?: string
  ): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      ...(message && { message }),
      meta: {
        timestamp: new Date().toISOString()
      }
    };
    return res.status(statusCode).json(response);
  }

  /**
   * Success response for list endpoints (with count)
   */
  static list<T>(
    res: Response,
    data: T[],
    message?: string
  ): Response {
    return this.success(res, data, message, { count: data.length });
  }
}
