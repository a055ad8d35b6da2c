export type { IAuthorRegister } from './author-register.js';
export type { IDiaryRegister } from './diary-register.js';
