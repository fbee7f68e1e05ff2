/**
 * 型別統一匯出入口
 *
 * @example
 * import type { Merchant, Order, Notify } from '@/types';
 */

export * from './common';
export * from './api';
export * from './errors';
export * from './payment';
