import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import {
  BookingConflictError,
  BookingDomainError,
  BookingErrorKind,
} from '../errors/booking.errors';

export const ERROR_STATUS: Record<BookingErrorKind, HttpStatus> = {
  NotFound: HttpStatus.NOT_FOUND,
  InvalidInterval: HttpStatus.BAD_REQUEST,
  InvalidRecurrence: HttpStatus.BAD_REQUEST,
  ResourceUnavailable: HttpStatus.CONFLICT,
  BookingConflict: HttpStatus.CONFLICT,
  InvalidTransition: HttpStatus.CONFLICT,
  NotEditable: HttpStatus.CONFLICT,
  Unauthorized: HttpStatus.FORBIDDEN,
  StoreUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
};

export interface BookingErrorBody {
  statusCode: number;
  error: BookingErrorKind;
  message: string;
  conflicts?: { bookingId: string; startTime: string; endTime: string }[];
}

export function toErrorBody(error: BookingDomainError): BookingErrorBody {
  const body: BookingErrorBody = {
    statusCode: ERROR_STATUS[error.kind],
    error: error.kind,
    message: error.message,
  };
  if (error instanceof BookingConflictError) {
    body.conflicts = error.conflicts.map((conflict) => ({
      bookingId: conflict.id,
      startTime: conflict.start_time.toISOString(),
      endTime: conflict.end_time.toISOString(),
    }));
  }
  return body;
}

@Catch(BookingDomainError)
export class BookingExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(BookingExceptionFilter.name);

  catch(exception: BookingDomainError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = toErrorBody(exception);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.kind}: ${exception.message}`);
    } else {
      this.logger.warn(`${exception.kind}: ${exception.message}`);
    }

    response.status(body.statusCode).json(body);
  }
}
