import { QueryInterface, DataTypes } from 'sequelize';

export default {
  async up(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.createTable('negotiation_session_closures', {
      session_id: {
        allowNull: false,
        primaryKey: true,
        type: DataTypes.STRING(100),
      },
      final_status: {
        allowNull: false,
        type: DataTypes.ENUM('ABANDONED', 'TIMEOUT'),
      },
      reason: {
        allowNull: true,
        type: DataTypes.TEXT,
      },
      closed_at: {
        allowNull: false,
        type: DataTypes.DATE,
      },
    });
  },
  async down(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.dropTable('negotiation_session_closures');
    await queryInterface.sequelize.query(
      'DROP TYPE IF EXISTS "enum_negotiation_session_closures_final_status";'
    );
  },
};
