export * from './http.module';
export * from './http-client.factory';
