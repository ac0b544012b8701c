import { z } from 'zod';

/**
 * Names of the supported traversal orders
 */
export const TRAVERSAL_ORDERS = [
  'in-order',
  'pre-order',
  'post-order',
  'level-order',
  'threaded-in-order',
] as const;

export const traversalOrderSchema = z.enum(TRAVERSAL_ORDERS);

export type TraversalOrder = z.infer<typeof traversalOrderSchema>;
