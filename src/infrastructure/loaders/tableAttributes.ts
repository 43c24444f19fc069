import { DataTypes } from 'sequelize';
import type { ModelAttributeColumnOptions, ModelAttributes } from 'sequelize';
import type { ColumnDefinition, ColumnSchema } from '../../domain/model/ColumnSchema.js';
import { decimalShape } from '../../domain/model/ColumnSchema.js';

function columnOptions(column: ColumnDefinition): ModelAttributeColumnOptions {
  switch (column.type) {
    case 'timestamp':
      return { type: DataTypes.DATE, allowNull: true };
    case 'integer':
      return { type: DataTypes.BIGINT, allowNull: true };
    case 'decimal': {
      const { precision, scale } = decimalShape(column);
      return { type: DataTypes.DECIMAL(precision, scale), allowNull: true };
    }
    case 'text':
      return { type: DataTypes.TEXT, allowNull: true };
  }
}

/** Column definitions for a destination table: one nullable column per declared column, no primary key. */
export function tableAttributes(columns: ColumnSchema): ModelAttributes {
  const attributes: ModelAttributes = {};
  for (const column of columns) {
    attributes[column.name] = columnOptions(column);
  }
  return attributes;
}
