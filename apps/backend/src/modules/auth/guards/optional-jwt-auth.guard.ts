import {
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { firstValueFrom, isObservable } from 'rxjs';
import { RequestWithUser } from '@common/interfaces/request-with-user.interface';

/**
 * Populates `request.user` when a valid bearer token is present. Anonymous
 * callers and callers with an unusable token still reach the handler; write
 * paths reject them later.
 */
@Injectable()
export class OptionalJwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(OptionalJwtAuthGuard.name);

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<RequestWithUser>();

    if (!request.headers.authorization) {
      return true;
    }

    try {
      const result = super.canActivate(context);
      return isObservable(result) ? await firstValueFrom(result) : await result;
    } catch (error) {
      if (error instanceof UnauthorizedException) {
        this.logger.warn(
          `Ignoring unusable bearer token on ${request.method} ${request.path}`,
        );
        return true;
      }
      throw error;
    }
  }
}
