export * from './shell/session';
export * from './runner/runner';
