import {
  ArgumentsHost,
  Catch,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import {
  PipelineError,
  PipelineErrorCode,
} from '@/shared/common/errors/pipeline.errors';

export function statusForPipelineError(code: PipelineErrorCode): HttpStatus {
  switch (code) {
    case 'NOT_FOUND':
      return HttpStatus.NOT_FOUND;
    case 'EXPORT_UNSUPPORTED':
      return HttpStatus.BAD_REQUEST;
    default:
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}

@Catch(PipelineError)
export class PipelineExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(PipelineExceptionFilter.name);

  catch(exception: PipelineError, host: ArgumentsHost) {
    const status = statusForPipelineError(exception.code);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `Pipeline error ${exception.code}: ${exception.message}`,
        exception.stack,
      );
    }

    super.catch(
      new HttpException(
        { statusCode: status, error: exception.code, message: exception.message },
        status,
        { cause: exception },
      ),
      host,
    );
  }
}
