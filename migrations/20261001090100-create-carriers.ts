import { QueryInterface, DataTypes } from 'sequelize';

export default {
  async up(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.createTable('carriers', {
      id: {
        allowNull: false,
        primaryKey: true,
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
      },
      mc_number: {
        allowNull: false,
        unique: true,
        type: DataTypes.STRING(20),
      },
      legal_name: {
        allowNull: false,
        type: DataTypes.STRING,
      },
      total_prior_loads: {
        allowNull: false,
        type: DataTypes.INTEGER,
        defaultValue: 0,
      },
      average_rating: {
        allowNull: true,
        type: DataTypes.DECIMAL(3, 2),
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
    await queryInterface.dropTable('carriers');
  },
};
