import 'reflect-metadata';
import { Logger } from '@nestjs/common';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

// Use cases log through Nest's static logger
Logger.overrideLogger(false);

