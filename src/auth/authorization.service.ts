import { Injectable } from '@nestjs/common';
import { ResourceCategory } from '../resource/entities/resource.entity';
import { BookingActor } from '../booking/booking-actor';
import { Principal } from './principal';
import { APPROVAL_SCOPES, Capability, ROLE_CAPABILITIES } from './roles';

@Injectable()
export class AuthorizationService {
  hasCapability(principal: Principal, capability: Capability): boolean {
    return ROLE_CAPABILITIES[principal.role].has(capability);
  }

  /**
   * Resource categories whose bookings the principal may approve.
   */
  approvableCategories(principal: Principal): ReadonlySet<ResourceCategory> {
    if (!this.hasCapability(principal, 'booking:approve')) {
      return new Set();
    }
    return new Set(APPROVAL_SCOPES[principal.role]);
  }

  toBookingActor(principal: Principal): BookingActor {
    return {
      kind: 'user',
      userId: principal.userId,
      approvableCategories: this.approvableCategories(principal),
    };
  }
}
