/**
 * In-memory fakes for the engine's ports, shared across tests.
 */

export { InMemoryHost } from './host.fake.js';
export type { InMemoryHostOptions } from './host.fake.js';
export { FakeAdapter } from './adapter.fake.js';
export type { AdapterCall } from './adapter.fake.js';
export { FakeMutator } from './mutator.fake.js';
export { RecordingNotifier } from './notifier.fake.js';
export type { Notification } from './notifier.fake.js';
export { InMemoryFileSystem } from './file-system.fake.js';
