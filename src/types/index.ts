export type * from './event.type';
export type * from './issue.type';
export type * from './summary.type';
