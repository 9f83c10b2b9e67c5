import {
  Model,
  DataTypes,
  Sequelize,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
} from 'sequelize';
import {
  FINAL_STATUSES,
  IDENTIFIER_MAX_LENGTH,
  SYSTEM_RESPONSES,
  type DecisionFactors,
  type FinalStatus,
  type SystemResponse,
} from '../modules/negotiation/engine/types.js';

/** pg returns DECIMAL columns as strings */
type Decimal = number | string;

export class NegotiationRound extends Model<
  InferAttributes<NegotiationRound>,
  InferCreationAttributes<NegotiationRound>
> {
  declare id: CreationOptional<string>;
  declare negotiationId: string;
  declare sessionId: string;
  declare loadId: string;
  declare carrierId: string | null;
  declare roundNumber: number;
  declare carrierOffer: Decimal;
  declare systemResponse: SystemResponse;
  declare counterOffer: Decimal | null;
  declare finalStatus: FinalStatus | null;
  declare loadboardRate: Decimal;
  declare minimumRate: Decimal;
  declare autoAcceptRate: Decimal;
  declare maximumRate: Decimal;
  declare decisionFactors: DecisionFactors;
  declare messageToCarrier: string;
  declare justification: string;
  declare createdAt: Date;
}

export default function negotiationRoundModel(sequelize: Sequelize): typeof NegotiationRound {
  NegotiationRound.init(
    {
      id: {
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
        primaryKey: true,
      },
      negotiationId: {
        type: DataTypes.UUID,
        allowNull: false,
        field: 'negotiation_id',
      },
      sessionId: {
        type: DataTypes.STRING(IDENTIFIER_MAX_LENGTH),
        allowNull: false,
        field: 'session_id',
      },
      loadId: {
        type: DataTypes.STRING(IDENTIFIER_MAX_LENGTH),
        allowNull: false,
        field: 'load_id',
      },
      carrierId: {
        type: DataTypes.STRING(IDENTIFIER_MAX_LENGTH),
        allowNull: true,
        field: 'carrier_id',
      },
      roundNumber: {
        type: DataTypes.INTEGER,
        allowNull: false,
        field: 'round_number',
      },
      carrierOffer: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: false,
        field: 'carrier_offer',
      },
      systemResponse: {
        type: DataTypes.ENUM(...SYSTEM_RESPONSES),
        allowNull: false,
        field: 'system_response',
      },
      counterOffer: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: true,
        field: 'counter_offer',
      },
      finalStatus: {
        type: DataTypes.ENUM(...FINAL_STATUSES),
        allowNull: true,
        field: 'final_status',
      },
      loadboardRate: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: false,
        field: 'loadboard_rate',
      },
      minimumRate: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: false,
        field: 'minimum_rate',
      },
      autoAcceptRate: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: false,
        field: 'auto_accept_rate',
      },
      maximumRate: {
        type: DataTypes.DECIMAL(10, 2),
        allowNull: false,
        field: 'maximum_rate',
      },
      decisionFactors: {
        type: DataTypes.JSONB,
        allowNull: false,
        field: 'decision_factors',
      },
      messageToCarrier: {
        type: DataTypes.TEXT,
        allowNull: false,
        field: 'message_to_carrier',
      },
      justification: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      createdAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'created_at',
      },
    },
    {
      sequelize,
      tableName: 'negotiation_rounds',
      timestamps: false,
      underscored: true,
      indexes: [
        { unique: true, fields: ['session_id', 'round_number'] },
        { fields: ['load_id'] },
        { fields: ['created_at'] },
      ],
    }
  );

  return NegotiationRound;
}
