import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

interface RequestWithHeaders {
  headers: Record<string, string | string[] | undefined>;
}

/** Requires `x-api-key` to match API_KEY; open when no key is configured. */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('API_KEY') || '';
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.apiKey) {
      return true;
    }

    const request = context.switchToHttp().getRequest<RequestWithHeaders>();
    const providedKey = request.headers['x-api-key'];

    if (!providedKey) {
      this.logger.warn('Missing API key in request');
      throw new UnauthorizedException('API key required');
    }

    if (providedKey !== this.apiKey) {
      this.logger.warn('Invalid API key provided');
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }
}
