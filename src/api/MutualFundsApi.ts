// src/api/MutualFundsApi.ts

import { BaseApi } from './BaseApi';
import { OrderIdSchema, SipIdSchema } from './schemas';
import type { MfOrderParams, ModifySipParams, SipParams } from './types';

export class MutualFundsApi extends BaseApi {
  async placeOrder(params: MfOrderParams): Promise<string> {
    const { order_id } = await this.callFor(OrderIdSchema, 'placeMfOrder', { body: params });
    return order_id;
  }

  async cancelOrder(orderId: string): Promise<string> {
    const { order_id } = await this.callFor(OrderIdSchema, 'cancelMfOrder', {
      segments: [orderId],
    });
    return order_id;
  }

  /**
   * All orders, or one order when `orderId` is given
   */
  async orders(orderId?: string): Promise<unknown> {
    if (orderId) {
      return this.call('mfOrderInfo', { segments: [orderId] });
    }
    return this.call('mfOrders');
  }

  async holdings(): Promise<unknown> {
    return this.call('mfHoldings');
  }

  async placeSip(params: SipParams): Promise<string> {
    const { sip_id } = await this.callFor(SipIdSchema, 'placeSip', { body: params });
    return sip_id;
  }

  async modifySip(sipId: string, params: ModifySipParams): Promise<string> {
    const { sip_id } = await this.callFor(SipIdSchema, 'modifySip', {
      segments: [sipId],
      body: params,
    });
    return sip_id;
  }

  async cancelSip(sipId: string): Promise<string> {
    const { sip_id } = await this.callFor(SipIdSchema, 'cancelSip', { segments: [sipId] });
    return sip_id;
  }

  async sips(sipId?: string): Promise<unknown> {
    if (sipId) {
      return this.call('sipInfo', { segments: [sipId] });
    }
    return this.call('sips');
  }
}
