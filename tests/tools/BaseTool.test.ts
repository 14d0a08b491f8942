import { z } from 'zod';
import {
  choiceOf,
  optionalNamespace,
  parseParams,
  positiveIntString,
  requiredResourceName,
} from '../../src/tools/BaseTool';
import { InvalidArgumentError } from '../../src/kubernetes/ErrorHandling';

describe('BaseTool parameter schemas', () => {
  const schema = z.object({
    name: requiredResourceName,
    namespace: optionalNamespace,
    status: choiceOf(z.enum(['all', 'ready', 'failed']).default('all')),
    limit: positiveIntString(20),
  });

  it('should apply defaults and trim blanks', () => {
    expect(parseParams(schema, { name: ' apps ', namespace: '  ' })).toEqual({
      name: 'apps',
      namespace: undefined,
      status: 'all',
      limit: 20,
    });
  });

  it('should normalise choices and numbers', () => {
    expect(parseParams(schema, { name: 'apps', status: 'FAILED', limit: '5' })).toEqual({
      name: 'apps',
      status: 'failed',
      limit: 5,
    });
  });

  it.each([
    [{}, "Invalid argument 'name': is required"],
    [{ name: 'apps', namespace: 'Flux_System' }, "Invalid argument 'namespace': must be a valid Kubernetes namespace name"],
    [{ name: 'apps', limit: '0' }, "Invalid argument 'limit': must be a positive integer, got '0'"],
    [{ name: 'apps', limit: 'ten' }, "Invalid argument 'limit': must be a positive integer, got 'ten'"],
  ])('should reject %p', (params, message) => {
    expect(() => parseParams(schema, params)).toThrow(InvalidArgumentError);
    expect(() => parseParams(schema, params)).toThrow(message);
  });

  it('should treat missing params as an empty object', () => {
    expect(parseParams(z.object({ namespace: optionalNamespace }), undefined)).toEqual({
      namespace: undefined,
    });
  });
});
