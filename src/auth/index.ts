export * from './auth.module';
export * from './credential.service';
export * from './guards/jwt-auth.guard';
export * from './decorators/roles.decorator';
export * from './exceptions/auth.exception';
export * from './interfaces/token.interface';
