export * from './aggregate';
export * from './credentials';
export * from './currency';
export * from './day-range';
export * from './errors';
export * from './render';
export * from './stripe-client';
export * from './stripe-config';
