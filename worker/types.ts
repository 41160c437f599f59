import type { Services } from './container';
import type { Logger } from './logger';

export type Variables = {
  services: Services;
  logger: Logger;
};

export type AppEnv = { Variables: Variables };
