// src/api/GttApi.ts

import { BaseApi } from './BaseApi';
import { TriggerIdSchema } from './schemas';
import type { FormBody } from '../core/http/types';
import type { GttParams } from './types';

export class GttApi extends BaseApi {
  async place(params: GttParams): Promise<number> {
    const { trigger_id } = await this.callFor(TriggerIdSchema, 'placeGtt', {
      body: toGttBody(params),
    });
    this.deps.logger.info('GTT placed', { triggerId: trigger_id });
    return trigger_id;
  }

  async modify(triggerId: number, params: GttParams): Promise<number> {
    const { trigger_id } = await this.callFor(TriggerIdSchema, 'modifyGtt', {
      segments: [String(triggerId)],
      body: toGttBody(params),
    });
    return trigger_id;
  }

  async cancel(triggerId: number): Promise<number> {
    const { trigger_id } = await this.callFor(TriggerIdSchema, 'cancelGtt', {
      segments: [String(triggerId)],
    });
    return trigger_id;
  }

  async list(): Promise<unknown> {
    return this.call('gtts');
  }

  async get(triggerId: number): Promise<unknown> {
    return this.call('gttInfo', { segments: [String(triggerId)] });
  }
}

/**
 * The trigger condition and its orders travel as JSON strings inside the form
 */
export function toGttBody(params: GttParams): FormBody {
  const condition = {
    exchange: params.exchange,
    tradingsymbol: params.tradingsymbol,
    trigger_values: params.trigger_values,
    last_price: params.last_price,
  };

  const orders = params.orders.map((order) => ({
    exchange: params.exchange,
    tradingsymbol: params.tradingsymbol,
    transaction_type: order.transaction_type,
    quantity: order.quantity,
    order_type: order.order_type,
    product: order.product,
    price: order.price,
  }));

  return {
    type: params.trigger_type,
    condition: JSON.stringify(condition),
    orders: JSON.stringify(orders),
  };
}
