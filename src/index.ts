export { Author } from '@domain/entities/author.js';
export { DiaryEntry } from '@domain/entities/diary-entry.js';
export { IdAllocator, authorIds } from '@domain/services/id-allocator.js';
export { AuthorRegister } from '@infra/registries/author-register.js';
export { DiaryRegister } from '@infra/registries/diary-register.js';
export { loadConfig } from '@infra/config/env-config.js';
export { SampleSeeder, type SeedResult } from '@features/sample-diary/sample-seeder.js';
export type { IAuthorRegister, IDiaryRegister } from '@domain/ports/index.js';
export * from '@domain/types/index.js';
export * from '@shared/lib/index.js';
