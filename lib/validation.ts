import * as cdk from 'aws-cdk-lib/core';
import { ConfigurationError } from './errors';

const IPV4_CIDR = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

/** Throws unless `value` is an IPv4 CIDR block such as `10.1.0.0/16`. */
export function validateCidr(value: string, parameter: string): string {
  const match = IPV4_CIDR.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`"${value}" is not an IPv4 CIDR block`, parameter);
  }
  const octets = match.slice(1, 5).map(Number);
  const prefixLength = Number(match[5]);
  if (octets.some((octet) => octet > 255) || prefixLength > 32) {
    throw new ConfigurationError(`"${value}" is out of range`, parameter);
  }
  return value.trim();
}

export function validateIntegerInRange(
  value: number,
  min: number,
  max: number,
  parameter: string,
): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`must be an integer between ${min} and ${max}, got ${value}`, parameter);
  }
  return value;
}

/**
 * Resolves a duration to whole seconds. Durations built from tokens cannot be
 * checked at declaration time, so they are rejected.
 */
export function durationSeconds(duration: cdk.Duration, parameter: string): number {
  if (duration.isUnresolved()) {
    throw new ConfigurationError('must be a concrete duration, not a token', parameter);
  }
  return duration.toSeconds();
}
