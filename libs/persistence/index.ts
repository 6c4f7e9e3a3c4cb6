export type {
    AccessRepository,
    ActiveProfileRecord,
    CascadeDelete,
    MembershipRecord
} from './repository.js';
export { PgAccessRepository } from './pgAccessRepository.js';
export { InMemoryAccessRepository } from './inMemoryAccessRepository.js';
