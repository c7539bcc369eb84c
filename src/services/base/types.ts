// src/services/base/types.ts
import winston from 'winston';

export interface ServiceConfig {
  logger: winston.Logger;
}
