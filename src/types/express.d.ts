import type { StaffContext } from './admin.types';

declare global {
  namespace Express {
    interface Request {
      staff?: StaffContext;
    }
  }
}

export {};
