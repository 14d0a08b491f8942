import { z } from 'zod';
import type { DerivedStatus } from '../../kubernetes/ConditionEvaluator.js';
import { choiceOf } from '../BaseTool.js';

export const STATUS_FILTERS = ['all', 'ready', 'failed', 'suspended'] as const;
export type StatusFilter = (typeof STATUS_FILTERS)[number];

export const statusFilterParam = choiceOf(z.enum(STATUS_FILTERS).default('all'));

export const statusFilterSchema = {
  type: 'string',
  description: 'Filter by status: all, ready, failed, suspended (default: all)',
  enum: [...STATUS_FILTERS],
};

export function matchesStatusFilter(status: DerivedStatus, filter: StatusFilter): boolean {
  return filter === 'all' || status.toLowerCase() === filter;
}
