import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { DriveExplorerError, type DriveExplorerErrorCode } from '../errors/drive-explorer.error';

const STATUS_BY_CODE: Record<DriveExplorerErrorCode, HttpStatus> = {
  not_found: HttpStatus.NOT_FOUND,
  auth_expired: HttpStatus.UNAUTHORIZED,
  validation: HttpStatus.BAD_REQUEST,
  unsupported_provider: HttpStatus.BAD_REQUEST,
  upstream_unavailable: HttpStatus.BAD_GATEWAY,
  item_skipped: HttpStatus.UNPROCESSABLE_ENTITY,
};

/** Maps the service's error taxonomy onto HTTP responses. */
@Catch(DriveExplorerError)
export class DriveExplorerErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(DriveExplorerErrorFilter.name);

  public catch(exception: DriveExplorerError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = STATUS_BY_CODE[exception.code];

    const log = { code: exception.code, details: exception.details, msg: exception.message };
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(log);
    } else {
      this.logger.warn(log);
    }

    response.status(status).json({
      statusCode: status,
      error: exception.code,
      message: exception.message,
    });
  }
}
