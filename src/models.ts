/**
 * Records returned by the remote API, for display only
 */

import { z } from 'zod';
import type { TableName } from './types';
import { ENTITY } from './enums';
import { TransformationError } from './errors';
import { isRecord } from './utils';

const orNull = (value: unknown): unknown => (value === undefined || value === '' ? null : value);

const id = z.preprocess(value => (typeof value === 'number' ? String(value) : value), z.string().min(1));
const optionalId = z.preprocess(
  value => (typeof value === 'number' ? String(value) : orNull(value)),
  z.string().nullable(),
);
const text = z.preprocess(orNull, z.string().nullable());
const numeric = z.preprocess(
  value => (typeof value === 'string' && value.trim() !== '' ? Number(value) : orNull(value)),
  z.number().nullable(),
);
const date = z.preprocess(value => {
  const present = orNull(value);
  return typeof present === 'string' || typeof present === 'number' ? new Date(present) : present;
}, z.date().nullable());

/**
 * Accept field names in any letter case; unknown fields are dropped
 */
function caseInsensitive<S extends z.ZodRawShape>(shape: S) {
  const canonical = new Map(Object.keys(shape).map(key => [key.toLowerCase(), key]));

  return z.preprocess(input => {
    if (!isRecord(input)) return input;
    const normalized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const field = canonical.get(key.toLowerCase());
      if (field !== undefined && !(field in normalized)) normalized[field] = value;
    }
    return normalized;
  }, z.object(shape));
}

export const productSchema = caseInsensitive({
  productoId: id,
  tiendaId: text,
  nombre: text,
  precio: numeric,
  stock: numeric,
});

export const clientSchema = caseInsensitive({
  clienteId: id,
  tiendaId: text,
  nombre: text,
  correo: text,
  telefono: text,
});

export const saleSchema = caseInsensitive({
  ventaId: id,
  tiendaId: text,
  fecha: date,
  total: numeric,
  clienteId: optionalId,
  cliente: z.preprocess(value => (value === undefined ? null : value), clientSchema.nullable()),
});

export const saleDetailSchema = caseInsensitive({
  ventaId: id,
  productoId: id,
  tiendaId: text,
  cantidad: numeric,
  subtotal: numeric,
});

export type Product = z.infer<typeof productSchema>;
export type Client = z.infer<typeof clientSchema>;
export type Sale = z.infer<typeof saleSchema>;
export type SaleDetail = z.infer<typeof saleDetailSchema>;

export type EntityRecord = Product | Client | Sale | SaleDetail;

// Table whose endpoint serves each entity
export const ENTITY_TABLE: Record<ENTITY, TableName> = {
  [ENTITY.PRODUCT]: 'producto',
  [ENTITY.CLIENT]: 'cliente',
  [ENTITY.SALE]: 'venta',
  [ENTITY.SALE_DETAIL]: 'detalle_venta',
};

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, entity: ENTITY, payload: unknown): T[] {
  const parsed = z.array(schema).safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new TransformationError(entity, `${where}${issue?.message ?? 'invalid payload'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Validate a list returned by an entity endpoint
 */
export function parseEntityList(entity: ENTITY.PRODUCT, payload: unknown): Product[];
export function parseEntityList(entity: ENTITY.CLIENT, payload: unknown): Client[];
export function parseEntityList(entity: ENTITY.SALE, payload: unknown): Sale[];
export function parseEntityList(entity: ENTITY.SALE_DETAIL, payload: unknown): SaleDetail[];
export function parseEntityList(entity: ENTITY, payload: unknown): EntityRecord[];
export function parseEntityList(entity: ENTITY, payload: unknown): EntityRecord[] {
  switch (entity) {
    case ENTITY.PRODUCT:
      return parseWith(productSchema, entity, payload);
    case ENTITY.CLIENT:
      return parseWith(clientSchema, entity, payload);
    case ENTITY.SALE:
      return parseWith(saleSchema, entity, payload);
    case ENTITY.SALE_DETAIL:
      return parseWith(saleDetailSchema, entity, payload);
  }
}
