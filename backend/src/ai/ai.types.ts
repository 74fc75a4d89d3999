import type { QueryCategory } from '@hotel-concierge/shared-types';

export const QUERY_CATEGORIES: readonly QueryCategory[] = ['1', '2'];

export const isQueryCategory = (value: string): value is QueryCategory =>
  QUERY_CATEGORIES.some((category) => category === value);

export type ConciergeOutcome =
  | {
      status: 'answered';
      category: QueryCategory;
      context: string;
      reply: string;
    }
  | {
      status: 'classification_failed';
    }
  | {
      status: 'unrecognized_category';
      category: string;
    };
