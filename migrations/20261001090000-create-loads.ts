import { QueryInterface, DataTypes } from 'sequelize';

export default {
  async up(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.createTable('loads', {
      id: {
        allowNull: false,
        primaryKey: true,
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
      },
      reference_number: {
        allowNull: false,
        unique: true,
        type: DataTypes.STRING(50),
      },
      loadboard_rate: {
        allowNull: false,
        type: DataTypes.DECIMAL(10, 2),
      },
      fuel_surcharge: {
        allowNull: false,
        type: DataTypes.DECIMAL(10, 2),
        defaultValue: 0,
      },
      urgency: {
        allowNull: false,
        type: DataTypes.ENUM('LOW', 'NORMAL', 'HIGH', 'CRITICAL'),
        defaultValue: 'NORMAL',
      },
      created_at: {
        allowNull: false,
        type: DataTypes.DATE,
      },
      updated_at: {
        allowNull: false,
        type: DataTypes.DATE,
      },
    });
  },
  async down(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.dropTable('loads');
    await queryInterface.sequelize.query('DROP TYPE IF EXISTS "enum_loads_urgency";');
  },
};
