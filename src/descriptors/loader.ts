/**
 * @fileoverview Descriptor file loading
 *
 * Reads `TypeDescriptor` JSON produced by `tactician scan` or by any other
 * scanner and validates it before it reaches the matcher.
 */

import * as fs from 'node:fs/promises';
import type { ZodError } from 'zod';
import { Errors } from '../core/errors.js';
import { safeJsonParse } from '../core/result.js';
import { DescriptorEnvelopeSchema, DescriptorListSchema, DESCRIPTOR_SCHEMA_VERSION } from './schema.js';
import type { TypeDescriptor } from './types.js';

function describeIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate already-parsed descriptor data: a bare array or a versioned
 * envelope. Each shape is checked on its own so issues carry exact paths.
 */
export function parseDescriptors(raw: unknown, source = '<input>'): TypeDescriptor[] {
  if (Array.isArray(raw)) {
    const parsed = DescriptorListSchema.safeParse(raw);
    if (!parsed.success) {
      throw Errors.descriptors(source, describeIssues(parsed.error));
    }
    return parsed.data;
  }

  const parsed = DescriptorEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw Errors.descriptors(source, describeIssues(parsed.error));
  }
  return parsed.data.types;
}

/**
 * Read and validate a descriptor file.
 */
export async function loadDescriptorFile(filePath: string): Promise<TypeDescriptor[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw Errors.descriptors(filePath, [`cannot read file: ${message}`]);
  }

  const json = safeJsonParse(text);
  if (!json.ok) {
    throw Errors.descriptors(filePath, [`invalid JSON: ${json.error.message}`]);
  }
  return parseDescriptors(json.value, filePath);
}

/**
 * Serialize descriptors in the versioned envelope `loadDescriptorFile` reads.
 */
export function serializeDescriptors(types: readonly TypeDescriptor[]): string {
  return JSON.stringify({ version: DESCRIPTOR_SCHEMA_VERSION, types }, null, 2);
}
