/**
 * Default Tree Layout Options
 * One drawing unit per grid unit, growing downwards.
 */

import type { TreeLayoutOptions } from '../types';
import { DEFAULT_SEPARATION } from './tree/tree-layout';

export const DEFAULT_TREE_LAYOUT_OPTIONS: TreeLayoutOptions = {
  horizontalGap: 1,
  verticalGap: 1,
  direction: 'DOWN',
  separation: DEFAULT_SEPARATION,
};
