import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { REQUIRED_CAPABILITIES } from './auth.decorators';
import { AuthorizationService } from './authorization.service';
import { AuthenticatedRequest } from './principal';
import { Capability, isRole } from './roles';

export const USER_ID_HEADER = 'x-user-id';
export const USER_ROLE_HEADER = 'x-user-role';

/**
 * Resolves the principal from the headers set by the identity proxy and
 * enforces the capabilities declared with `@RequireCapability`.
 */
@Injectable()
export class PrincipalGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly authorizationService: AuthorizationService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const userId = request.header(USER_ID_HEADER);
    const role = request.header(USER_ROLE_HEADER)?.toUpperCase();

    if (!userId || !isRole(role)) {
      throw new UnauthorizedException('Missing or invalid identity headers');
    }

    const principal = { userId, role };
    request.principal = principal;

    const required =
      this.reflector.getAllAndOverride<Capability[] | undefined>(
        REQUIRED_CAPABILITIES,
        [context.getHandler(), context.getClass()],
      ) ?? [];

    const missing = required.filter(
      (capability) => !this.authorizationService.hasCapability(principal, capability),
    );
    if (missing.length > 0) {
      throw new ForbiddenException(`Missing capability: ${missing.join(', ')}`);
    }

    return true;
  }
}
