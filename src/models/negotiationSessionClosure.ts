import { Model, DataTypes, Sequelize, InferAttributes, InferCreationAttributes } from 'sequelize';
import { CLOSURE_STATUSES, IDENTIFIER_MAX_LENGTH, type ClosureStatus } from '../modules/negotiation/engine/types.js';

export class NegotiationSessionClosure extends Model<
  InferAttributes<NegotiationSessionClosure>,
  InferCreationAttributes<NegotiationSessionClosure>
> {
  declare sessionId: string;
  declare finalStatus: ClosureStatus;
  declare reason: string | null;
  declare closedAt: Date;
}

export default function negotiationSessionClosureModel(
  sequelize: Sequelize
): typeof NegotiationSessionClosure {
  NegotiationSessionClosure.init(
    {
      sessionId: {
        type: DataTypes.STRING(IDENTIFIER_MAX_LENGTH),
        primaryKey: true,
        field: 'session_id',
      },
      finalStatus: {
        type: DataTypes.ENUM(...CLOSURE_STATUSES),
        allowNull: false,
        field: 'final_status',
      },
      reason: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      closedAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'closed_at',
      },
    },
    {
      sequelize,
      tableName: 'negotiation_session_closures',
      timestamps: false,
      underscored: true,
    }
  );

  return NegotiationSessionClosure;
}
