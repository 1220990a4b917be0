// src/api/PortfolioApi.ts

import { BaseApi } from './BaseApi';
import { FlagSchema } from './schemas';
import type { ConvertPositionParams } from './types';

export class PortfolioApi extends BaseApi {
  async holdings(): Promise<unknown> {
    return this.call('holdings');
  }

  async positions(): Promise<unknown> {
    return this.call('positions');
  }

  /**
   * Move an open position between products, e.g. MIS to CNC
   */
  async convertPosition(params: ConvertPositionParams): Promise<boolean> {
    return this.callFor(FlagSchema, 'convertPosition', { body: params });
  }
}
