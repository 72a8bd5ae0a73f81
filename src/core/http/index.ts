export * from './HttpHeaders';
export * from './HttpMessage';
export * from './cookies';
export * from './parser';
