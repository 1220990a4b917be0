// src/api/types.ts

import type { HttpCore } from '../core/http/HttpCore';
import type { Credentials } from '../core/auth/Credentials';
import type { Hasher } from '../core/auth/Hasher';
import type { Logger } from '../observability/Logger';

export interface ApiDeps {
  http: HttpCore;
  credentials: Credentials;
  hasher: Hasher;
  logger: Logger;
  loginBaseUrl: string;
}

export type Exchange = 'NSE' | 'BSE' | 'NFO' | 'CDS' | 'BCD' | 'BFO' | 'MCX';

export type TransactionType = 'BUY' | 'SELL';

export type Product = 'CNC' | 'NRML' | 'MIS' | 'MTF';

export type OrderType = 'MARKET' | 'LIMIT' | 'SL' | 'SL-M';

export type OrderVariety = 'regular' | 'amo' | 'co' | 'iceberg' | 'auction';

export type Validity = 'DAY' | 'IOC' | 'TTL';

// Wire field names are kept as the API spells them
export type OrderParams = {
  exchange: Exchange;
  tradingsymbol: string;
  transaction_type: TransactionType;
  quantity: number;
  product: Product;
  order_type: OrderType;
  price?: number;
  trigger_price?: number;
  disclosed_quantity?: number;
  validity?: Validity;
  validity_ttl?: number;
  iceberg_legs?: number;
  iceberg_quantity?: number;
  auction_number?: string;
  tag?: string;
};

export type ModifyOrderParams = {
  quantity?: number;
  price?: number;
  order_type?: OrderType;
  trigger_price?: number;
  validity?: Validity;
  disclosed_quantity?: number;
};

export type ConvertPositionParams = {
  exchange: Exchange;
  tradingsymbol: string;
  transaction_type: TransactionType;
  position_type: 'overnight' | 'day';
  quantity: number;
  old_product: Product;
  new_product: Product;
};

export type MfOrderParams = {
  tradingsymbol: string;
  transaction_type: TransactionType;
  quantity?: number;
  amount?: number;
  tag?: string;
};

export type SipParams = {
  tradingsymbol: string;
  amount: number;
  instalments: number;
  frequency: 'weekly' | 'monthly' | 'quarterly';
  initial_amount?: number;
  instalment_day?: number;
  tag?: string;
};

export type ModifySipParams = {
  amount?: number;
  instalments?: number;
  frequency?: 'weekly' | 'monthly' | 'quarterly';
  instalment_day?: number;
  status?: 'active' | 'paused';
};

export type HistoricalInterval =
  | 'minute'
  | '3minute'
  | '5minute'
  | '10minute'
  | '15minute'
  | '30minute'
  | '60minute'
  | 'day';

export interface HistoricalOptions {
  continuous?: boolean;
  oi?: boolean;
}

export interface GttOrder {
  transaction_type: TransactionType;
  quantity: number;
  order_type: 'LIMIT' | 'MARKET';
  product: Product;
  price: number;
}

export interface GttParams {
  trigger_type: 'single' | 'two-leg';
  exchange: Exchange;
  tradingsymbol: string;
  trigger_values: number[];
  last_price: number;
  orders: GttOrder[];
}
