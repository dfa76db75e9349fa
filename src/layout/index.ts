/**
 * Layout Module
 */

export * from './tree';
export { DEFAULT_TREE_LAYOUT_OPTIONS } from './default-options';
