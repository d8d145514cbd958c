import type { Request } from 'express';
import { Role } from './roles';

/**
 * Identity asserted by the upstream identity proxy.
 */
export interface Principal {
  userId: string;
  role: Role;
}

export interface AuthenticatedRequest extends Request {
  principal?: Principal;
}
