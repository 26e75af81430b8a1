export { createMockRconClient } from './rcon-client.mock.js';
export { createMockProcessRunner } from './process-runner.mock.js';
