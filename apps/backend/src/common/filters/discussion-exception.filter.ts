import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ErrorEnvelope } from '@discussion/shared-types';
import { DiscussionError } from '../exceptions/discussion.exceptions';

/**
 * Renders the known failure taxonomy as `{ data, error, http_status }`.
 * Anything else is left to Nest's default handler.
 */
@Catch(DiscussionError, HttpException)
export class DiscussionExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DiscussionExceptionFilter.name);

  catch(exception: DiscussionError | HttpException, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const envelope = this.toEnvelope(exception);

    if (envelope.http_status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.name}: ${exception.message}`);
    } else {
      this.logger.warn(`${exception.name}: ${exception.message}`);
    }

    response.status(envelope.http_status).json(envelope);
  }

  toEnvelope(exception: DiscussionError | HttpException): ErrorEnvelope {
    if (exception instanceof DiscussionError) {
      return {
        data: {},
        error: exception.publicMessage,
        http_status: exception.status,
        ...(exception.code !== undefined ? { code: exception.code } : {}),
      };
    }

    return {
      data: {},
      error: this.describeHttpException(exception),
      http_status: exception.getStatus(),
    };
  }

  private describeHttpException(exception: HttpException): string {
    const body = exception.getResponse();
    if (typeof body === 'string') {
      return body;
    }
    if ('message' in body) {
      const { message } = body;
      if (typeof message === 'string') {
        return message;
      }
      if (Array.isArray(message)) {
        return message.join('-');
      }
    }
    return exception.message;
  }
}
