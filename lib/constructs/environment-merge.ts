import * as cdk from 'aws-cdk-lib/core';
import * as lambda from 'aws-cdk-lib/aws-lambda';

export type Environment<V = string> = Readonly<Record<string, V>>;

/** Entries of `required` whose keys `existing` does not define. */
export function missingEnvironment<V>(existing: Environment<V>, required: Environment<V>): Record<string, V> {
  const missing: Record<string, V> = {};
  for (const [key, value] of Object.entries(required)) {
    if (!Object.hasOwn(existing, key)) {
      missing[key] = value;
    }
  }
  return missing;
}

/**
 * Additive merge: keys already in `existing` keep their value. Applying the
 * same `required` set twice yields the same result as applying it once.
 */
export function mergeEnvironment<V>(existing: Environment<V>, required: Environment<V>): Record<string, V> {
  return { ...existing, ...missingEnvironment(existing, required) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Environment currently declared on a function, with token values resolved to
 * their CloudFormation form.
 */
export function declaredEnvironment(fn: lambda.Function): Record<string, unknown> {
  const cfnFunction = fn.node.defaultChild;
  if (!(cfnFunction instanceof lambda.CfnFunction)) {
    return {};
  }
  const resolved: unknown = cdk.Stack.of(fn).resolve(cfnFunction.environment);
  if (!isRecord(resolved)) {
    return {};
  }
  const variables = resolved.variables ?? resolved.Variables;
  return isRecord(variables) ? variables : {};
}

/**
 * Adds each required variable the function does not already define and
 * returns the keys that were added. Values configured by the function's owner
 * are never overwritten.
 */
export function injectEnvironment(fn: lambda.Function, required: Environment): string[] {
  const additions = missingEnvironment<unknown>(declaredEnvironment(fn), required);
  const injected: string[] = [];
  for (const [key, value] of Object.entries(required)) {
    if (Object.hasOwn(additions, key)) {
      fn.addEnvironment(key, value);
      injected.push(key);
    }
  }
  return injected;
}
