export interface LogContext {
  gameId?: string;
  clientId?: string;
  action?: string;
  method?: string;
  path?: string;
  ip?: string;
  userAgent?: string;
  duration?: number;
  [key: string]: unknown;
}
