/**
 * Zod schemas for validating table metadata
 */

import { z } from 'zod';
import { TARGET_FIELD_TYPES } from '../types/index.js';

/** Target field type, accepted in any letter case ("bigint", "BIGINT") */
export const targetFieldTypeSchema = z
  .string()
  .min(1)
  .transform((value) => value.toUpperCase())
  .pipe(z.enum(TARGET_FIELD_TYPES));

/** Single column; typeString defaults to the lower-cased type */
export const columnDefinitionSchema = z
  .object({
    name: z.string().min(1),
    type: targetFieldTypeSchema,
    typeString: z.string().min(1).optional(),
  })
  .strict()
  .transform((column) => ({
    name: column.name,
    type: column.type,
    typeString: column.typeString ?? column.type.toLowerCase(),
  }));

/** Table metadata: data columns followed by partition columns */
export const tableInfoSchema = z
  .object({
    name: z.string().min(1),
    location: z.string().min(1),
    dataColumns: z.array(columnDefinitionSchema).min(1),
    partitionColumns: z.array(columnDefinitionSchema).default([]),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    const columns = [...value.dataColumns, ...value.partitionColumns];
    columns.forEach((column, i) => {
      const key = column.name.toLowerCase();
      if (seen.has(key)) {
        const inData = i < value.dataColumns.length;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate column name: ${column.name}`,
          path: inData
            ? ['dataColumns', i, 'name']
            : ['partitionColumns', i - value.dataColumns.length, 'name'],
        });
      }
      seen.add(key);
    });
  });

/** Export types from schemas */
export type TableInfo = z.infer<typeof tableInfoSchema>;
