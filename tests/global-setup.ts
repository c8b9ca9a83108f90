// Vitest runs a globalSetup module's `teardown` export after all tests complete.
export { default as teardown } from './global-teardown.js';
