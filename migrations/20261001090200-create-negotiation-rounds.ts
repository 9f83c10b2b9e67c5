import { QueryInterface, DataTypes } from 'sequelize';

export default {
  async up(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.createTable('negotiation_rounds', {
      id: {
        allowNull: false,
        primaryKey: true,
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
      },
      negotiation_id: {
        allowNull: false,
        type: DataTypes.UUID,
      },
      session_id: {
        allowNull: false,
        type: DataTypes.STRING(100),
      },
      load_id: {
        allowNull: false,
        type: DataTypes.STRING(100),
      },
      carrier_id: {
        allowNull: true,
        type: DataTypes.STRING(100),
      },
      round_number: {
        allowNull: false,
        type: DataTypes.INTEGER,
      },
      carrier_offer: {
        allowNull: false,
        type: DataTypes.DECIMAL(10, 2),
      },
      system_response: {
        allowNull: false,
        type: DataTypes.ENUM('ACCEPTED', 'COUNTER_OFFER', 'REJECTED'),
      },
      counter_offer: {
        allowNull: true,
        type: DataTypes.DECIMAL(10, 2),
      },
      final_status: {
        allowNull: true,
        type: DataTypes.ENUM('DEAL_ACCEPTED', 'DEAL_REJECTED', 'ABANDONED', 'TIMEOUT'),
      },
      loadboard_rate: {
        allowNull: false,
        type: DataTypes.DECIMAL(10, 2),
      },
      minimum_rate: {
        allowNull: false,
        type: DataTypes.DECIMAL(10, 2),
      },
      auto_accept_rate: {
        allowNull: false,
        type: DataTypes.DECIMAL(10, 2),
      },
      maximum_rate: {
        allowNull: false,
        type: DataTypes.DECIMAL(10, 2),
      },
      decision_factors: {
        allowNull: false,
        type: DataTypes.JSONB,
      },
      message_to_carrier: {
        allowNull: false,
        type: DataTypes.TEXT,
      },
      justification: {
        allowNull: false,
        type: DataTypes.TEXT,
      },
      created_at: {
        allowNull: false,
        type: DataTypes.DATE,
      },
    });

    // One row per round; concurrent writers of the same round collide here
    await queryInterface.addIndex('negotiation_rounds', ['session_id', 'round_number'], {
      unique: true,
      name: 'negotiation_rounds_session_id_round_number',
    });
    await queryInterface.addIndex('negotiation_rounds', ['load_id']);
    await queryInterface.addIndex('negotiation_rounds', ['created_at']);
  },
  async down(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.dropTable('negotiation_rounds');
    await queryInterface.sequelize.query('DROP TYPE IF EXISTS "enum_negotiation_rounds_system_response";');
    await queryInterface.sequelize.query('DROP TYPE IF EXISTS "enum_negotiation_rounds_final_status";');
  },
};
