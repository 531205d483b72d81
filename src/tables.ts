/**
 * Catalogue of the tables that take part in a sync run
 */

import type { TableName } from './types';

// Convention columns shared by every synced table
export const SYNC_FLAG_COLUMN = 'IsSynced';
export const IDENTITY_COLUMN = 'Id';

export interface TableDefinition {
  endpoint: string;
  // Local column name -> API field name, matched case-insensitively
  columnMap: Record<string, string>;
}

export const TABLES: Record<TableName, TableDefinition> = {
  producto: {
    endpoint: '/api/productos',
    columnMap: {
      Producto_id: 'productoId',
      TiendaId: 'tiendaId',
      Nombre: 'nombre',
      Precio: 'precio',
      Stock: 'stock',
    },
  },
  cliente: {
    endpoint: '/api/clientes',
    columnMap: {
      Cliente_id: 'clienteId',
      TiendaId: 'tiendaId',
      Nombre: 'nombre',
      Correo: 'correo',
      Telefono: 'telefono',
    },
  },
  venta: {
    endpoint: '/api/ventas',
    columnMap: {
      Venta_id: 'ventaId',
      TiendaId: 'tiendaId',
      Fecha: 'fecha',
      Total: 'total',
      Cliente_id: 'clienteId',
    },
  },
  detalle_venta: {
    endpoint: '/api/detallesventa',
    columnMap: {
      Venta_id: 'ventaId',
      Producto_id: 'productoId',
      TiendaId: 'tiendaId',
      Cantidad: 'cantidad',
      Subtotal: 'subtotal',
    },
  },
};

// Referenced entities first, so foreign keys always resolve remotely
export const DEPENDENCY_ORDER: readonly TableName[] = ['producto', 'cliente', 'venta', 'detalle_venta'];

export function isTableName(name: string): name is TableName {
  return DEPENDENCY_ORDER.some(table => table === name);
}

/**
 * Normalize a table selection: lower-case, trim, drop duplicates and unknown
 * names, and sort by dependency order.
 */
export function orderTables(selection: readonly string[]): { ordered: TableName[]; unknown: string[] } {
  const wanted = new Set<TableName>();
  const unknown: string[] = [];

  for (const raw of selection) {
    const name = raw.trim().toLowerCase();
    if (isTableName(name)) {
      wanted.add(name);
    } else {
      unknown.push(raw);
    }
  }

  return {
    ordered: DEPENDENCY_ORDER.filter(table => wanted.has(table)),
    unknown,
  };
}
