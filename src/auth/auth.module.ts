import { Module } from '@nestjs/common';
import { AuthorizationService } from './authorization.service';
import { PrincipalGuard } from './principal.guard';

@Module({
  providers: [AuthorizationService, PrincipalGuard],
  exports: [AuthorizationService, PrincipalGuard],
})
export class AuthModule {}
