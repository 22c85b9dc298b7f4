export * from './logger.module';
export * from './custom-logger.service';
export * from './log-sanitizer.util';
