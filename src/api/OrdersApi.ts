// src/api/OrdersApi.ts

import { BaseApi } from './BaseApi';
import { OrderIdSchema } from './schemas';
import type { ModifyOrderParams, OrderParams, OrderVariety } from './types';

export class OrdersApi extends BaseApi {
  /**
   * Place an order. Rejections surface as `OrderException`, `MarginException`
   * or `InputException`; a write is never replayed after a server error.
   *
   * @returns The exchange-independent order id
   */
  async placeOrder(variety: OrderVariety, params: OrderParams): Promise<string> {
    const { order_id } = await this.callFor(OrderIdSchema, 'placeOrder', {
      segments: [variety],
      body: params,
    });
    this.deps.logger.info('Order placed', { variety, orderId: order_id });
    return order_id;
  }

  async modifyOrder(
    variety: OrderVariety,
    orderId: string,
    params: ModifyOrderParams
  ): Promise<string> {
    const { order_id } = await this.callFor(OrderIdSchema, 'modifyOrder', {
      segments: [variety, orderId],
      body: params,
    });
    return order_id;
  }

  async cancelOrder(variety: OrderVariety, orderId: string, parentOrderId?: string): Promise<string> {
    const { order_id } = await this.callFor(OrderIdSchema, 'cancelOrder', {
      segments: [variety, orderId],
      query: { parent_order_id: parentOrderId },
    });
    return order_id;
  }

  /**
   * Exit a cover order leg
   */
  async exitOrder(variety: OrderVariety, orderId: string, parentOrderId?: string): Promise<string> {
    return this.cancelOrder(variety, orderId, parentOrderId);
  }

  async orders(): Promise<unknown> {
    return this.call('orders');
  }

  async orderHistory(orderId: string): Promise<unknown> {
    return this.call('orderHistory', { segments: [orderId] });
  }

  async trades(): Promise<unknown> {
    return this.call('trades');
  }

  async orderTrades(orderId: string): Promise<unknown> {
    return this.call('orderTrades', { segments: [orderId, 'trades'] });
  }
}
