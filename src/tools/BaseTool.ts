import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterConnection } from '../kubernetes/ClusterConnection.js';
import { InvalidArgumentError } from '../kubernetes/ErrorHandling.js';
import { isValidNamespace, isValidResourceName } from '../utils/InputValidation.js';

/**
 * Base interface for all cluster query tools. Every parameter is an
 * optional string and every result is one markdown string.
 */
export interface BaseTool {
  /**
   * The tool definition for MCP registration
   */
  tool: Tool;

  /**
   * Run the query. Cluster and argument failures are thrown as typed
   * errors; the plugin turns them into `Error:` text.
   */
  execute(params: unknown, connection: ClusterConnection): Promise<string>;
}

/**
 * Common parameter schemas used across multiple tools
 */
export const CommonSchemas = {
  namespace: {
    type: 'string',
    description: 'Namespace to filter (default: all namespaces)',
  },
  requiredNamespace: {
    type: 'string',
    description: 'Namespace of the resource',
  },
  name: {
    type: 'string',
    description: 'Name of the resource',
  },
  clusterName: {
    type: 'string',
    description: 'Name of the Cluster API cluster (default: all clusters)',
  },
};

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export const optionalString = z.preprocess(blankToUndefined, z.string().optional());

export const optionalNamespace = z.preprocess(
  blankToUndefined,
  z
    .string()
    .refine(isValidNamespace, { message: 'must be a valid Kubernetes namespace name' })
    .optional(),
);

export const requiredNamespace = z.preprocess(
  blankToUndefined,
  z.string({ required_error: 'is required' }).refine(isValidNamespace, {
    message: 'must be a valid Kubernetes namespace name',
  }),
);

export const optionalResourceName = z.preprocess(
  blankToUndefined,
  z
    .string()
    .refine(isValidResourceName, { message: 'must be a valid Kubernetes resource name' })
    .optional(),
);

export const requiredResourceName = z.preprocess(
  blankToUndefined,
  z.string({ required_error: 'is required' }).refine(isValidResourceName, {
    message: 'must be a valid Kubernetes resource name',
  }),
);

function normalizeChoice(value: unknown): unknown {
  const cleaned = blankToUndefined(value);
  return typeof cleaned === 'string' ? cleaned.toLowerCase() : cleaned;
}

/**
 * Case-insensitive enum parameter, e.g. `choiceOf(z.enum(['all', 'ready']).default('all'))`
 */
export function choiceOf<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(normalizeChoice, schema);
}

/**
 * Positive integer passed as a string, e.g. `limit: "20"`
 */
export function positiveIntString(fallback: number) {
  return z.preprocess(blankToUndefined, z.string().optional()).transform((value, ctx) => {
    if (value === undefined) return fallback;
    if (!/^\d+$/.test(value) || Number(value) < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be a positive integer, got '${value}'`,
      });
      return z.NEVER;
    }
    return Number(value);
  });
}

/**
 * Validate raw tool arguments; the first problem becomes an InvalidArgumentError
 */
export function parseParams<T extends z.ZodTypeAny>(schema: T, params: unknown): z.output<T> {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new InvalidArgumentError(
      field ? `Invalid argument '${field}': ${issue.message}` : `Invalid arguments: ${issue.message}`,
      { issues: result.error.issues.map((entry) => entry.message) },
    );
  }
  return result.data;
}
