export { openStore, Store, type StoreOptions } from './client';
export { SqliteActivityRepository } from './repositories/activity-repository';
export { SqliteParticipantRepository } from './repositories/participant-repository';
