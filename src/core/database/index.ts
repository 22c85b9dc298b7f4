export * from './database.module';
export * from './database.exceptions';
export * from './postgrest.service';
export * from './repositories';
