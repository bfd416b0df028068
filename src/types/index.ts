export * from './user.js';
export * from './token.js';
export * from './hono.js';
export * from './clock.js';
