export * from './catalog.module';
export * from './exceptions/catalog.exception';
export * from './integrity/integrity-guard.service';
export * from './query/catalog-query.service';
