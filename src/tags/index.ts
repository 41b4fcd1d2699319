/**
 * Barrel export for the tags module.
 */
export { GroupParser, parseGroups } from './parser';
