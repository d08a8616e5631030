export { getDatabaseConfig } from './database.config';
export { default as discourseConfig } from './discourse.config';
export type { DiscourseConfig } from './discourse.config';
export { default as servicesConfig } from './services.config';
export type { ServicesConfig } from './services.config';
