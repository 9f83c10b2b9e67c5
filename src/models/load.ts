import {
  Model,
  DataTypes,
  Sequelize,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
} from 'sequelize';
import { URGENCY_TIERS, type Urgency } from '../modules/negotiation/engine/types.js';

/**
 * Pricing columns of a posted load. Load search and booking live elsewhere;
 * this service only reads them.
 */
export class Load extends Model<InferAttributes<Load>, InferCreationAttributes<Load>> {
  declare id: CreationOptional<string>;
  declare referenceNumber: string;
  declare loadboardRate: number | string;
  declare fuelSurcharge: CreationOptional<number | string>;
  declare urgency: CreationOptional<Urgency>;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}

export default function loadModel(sequelize: Sequelize): typeof Load {
  Load.init(
    {
      id: {
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
        primaryKey: true,
      },
      referenceNumber: {
        type: DataTypes.STRING(50),
        allowNull: false,
        unique: true,
        field: 'reference_number',
      },
      loadboardRate: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: false,
        field: 'loadboard_rate',
      },
      fuelSurcharge: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: false,
        defaultValue: 0,
        field: 'fuel_surcharge',
      },
      urgency: {
        type: DataTypes.ENUM(...URGENCY_TIERS),
        allowNull: false,
        defaultValue: 'NORMAL',
      },
      createdAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'created_at',
      },
      updatedAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'updated_at',
      },
    },
    {
      sequelize,
      tableName: 'loads',
      timestamps: true,
      underscored: true,
    }
  );

  return Load;
}
