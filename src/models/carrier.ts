import {
  Model,
  DataTypes,
  Sequelize,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
} from 'sequelize';

export class Carrier extends Model<InferAttributes<Carrier>, InferCreationAttributes<Carrier>> {
  declare id: CreationOptional<string>;
  declare mcNumber: string;
  declare legalName: string;
  declare totalPriorLoads: CreationOptional<number>;
  declare averageRating: number | string | null;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}

export default function carrierModel(sequelize: Sequelize): typeof Carrier {
  Carrier.init(
    {
      id: {
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
        primaryKey: true,
      },
      mcNumber: {
        type: DataTypes.STRING(20),
        allowNull: false,
        unique: true,
        field: 'mc_number',
      },
      legalName: {
        type: DataTypes.STRING,
        allowNull: false,
        field: 'legal_name',
      },
      totalPriorLoads: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
        field: 'total_prior_loads',
      },
      averageRating: {
        type: DataTypes.DECIMAL(3, 2),
        allowNull: true,
        field: 'average_rating',
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
      tableName: 'carriers',
      timestamps: true,
      underscored: true,
    }
  );

  return Carrier;
}
