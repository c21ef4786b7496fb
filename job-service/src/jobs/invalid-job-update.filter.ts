import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  BadRequestException,
} from '@nestjs/common';
import { Response } from 'express';
import { InvalidJobUpdateError } from './job-update';

/**
 * Converts rejected job updates to HTTP responses.
 * - InvalidJobUpdateError → 400 Bad Request
 */
@Catch(InvalidJobUpdateError)
export class InvalidJobUpdateFilter implements ExceptionFilter {
  catch(exception: InvalidJobUpdateError, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();

    const httpException = new BadRequestException(exception.message);
    res.status(httpException.getStatus()).json(httpException.getResponse());
  }
}
