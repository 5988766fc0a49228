export * from './api/auth';
export * from './api/account';
export * from './api/share';
export * from './api/audit';
export * from './api/user';
