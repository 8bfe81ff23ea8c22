import { ExecutionContext } from '../core/context';

declare global {
  namespace Express {
    interface Request {
      id: string;
      ctx: ExecutionContext;
    }
  }
}

export {};
