// src/api/BaseApi.ts

import type { z } from 'zod';
import type { ApiDeps } from './types';
import type { DispatchOptions } from '../core/http/types';
import type { Operation } from '../core/endpoints/EndpointRegistry';
import { DataException } from '../utils/errors';

export abstract class BaseApi {
  constructor(protected deps: ApiDeps) {}

  /**
   * Dispatch an operation and return the unwrapped `data` payload
   */
  protected async call(operation: Operation, options?: DispatchOptions): Promise<unknown> {
    const response = await this.deps.http.dispatch(operation, options);
    return response.data;
  }

  /**
   * Dispatch an operation and validate the payload against `schema`
   *
   * @throws {DataException} If the payload does not have the expected shape
   */
  protected async callFor<S extends z.ZodTypeAny>(
    schema: S,
    operation: Operation,
    options?: DispatchOptions
  ): Promise<z.output<S>> {
    const data = await this.call(operation, options);
    const result = schema.safeParse(data);

    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      this.deps.logger.warn('Unexpected response shape', { operation, issues });
      throw new DataException(`Unexpected ${operation} response: ${issues}`, { operation });
    }

    return result.data;
  }
}
