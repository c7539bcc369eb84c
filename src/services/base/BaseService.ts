// src/services/base/BaseService.ts
import winston from 'winston';
import { ServiceConfig } from './types';

export abstract class BaseService {
  protected logger: winston.Logger;

  constructor(config: ServiceConfig) {
    this.logger = config.logger.child({ component: new.target.name });
  }
}
