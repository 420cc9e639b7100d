import {
  Model,
  DataTypes,
  Sequelize,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
  ModelStatic,
} from 'sequelize';
import {
  fuelTypes,
  transmissions,
  vehicleConditions,
  type FuelType,
  type Transmission,
  type VehicleCondition,
} from '../types/index.js';

export class VehicleModel extends Model<
  InferAttributes<VehicleModel>,
  InferCreationAttributes<VehicleModel>
> {
  declare id: CreationOptional<number>;
  declare vin: string;
  declare registrationNumber: string;
  declare make: string;
  declare model: string;
  declare year: number;
  declare version: string | null;
  declare mileage: number;
  declare fuelType: FuelType;
  declare transmission: Transmission;
  declare powerHp: number;
  declare engineCc: number | null;
  declare originalPurchasePrice: number | null;
  declare currentMarketValue: number;
  declare estimatedTradeInValue: number | null;
  declare condition: VehicleCondition;
  declare inStock: CreationOptional<boolean>;
  declare stockLocation: string | null;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;

  static associate(models: Record<string, ModelStatic<Model>>): void {
    this.hasMany(models.Offer, {
      foreignKey: 'vehicleId',
      as: 'Offers',
    });
  }
}

export default function vehicleModel(sequelize: Sequelize): typeof VehicleModel {
  VehicleModel.init(
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      vin: {
        type: DataTypes.STRING(17),
        allowNull: false,
        unique: true,
      },
      registrationNumber: {
        type: DataTypes.STRING(20),
        allowNull: false,
        unique: true,
      },
      make: { type: DataTypes.STRING(100), allowNull: false },
      model: { type: DataTypes.STRING(100), allowNull: false },
      year: { type: DataTypes.INTEGER, allowNull: false },
      version: DataTypes.STRING(100),
      mileage: {
        type: DataTypes.INTEGER,
        allowNull: false,
        validate: { min: 0 },
      },
      fuelType: { type: DataTypes.ENUM(...fuelTypes), allowNull: false },
      transmission: { type: DataTypes.ENUM(...transmissions), allowNull: false },
      powerHp: { type: DataTypes.INTEGER, allowNull: false },
      engineCc: DataTypes.INTEGER,
      originalPurchasePrice: DataTypes.DOUBLE,
      currentMarketValue: { type: DataTypes.DOUBLE, allowNull: false },
      estimatedTradeInValue: DataTypes.DOUBLE,
      condition: { type: DataTypes.ENUM(...vehicleConditions), allowNull: false },
      inStock: {
        type: DataTypes.BOOLEAN,
        defaultValue: true,
      },
      stockLocation: DataTypes.STRING(200),
      createdAt: DataTypes.DATE,
      updatedAt: DataTypes.DATE,
    },
    {
      sequelize,
      tableName: 'Vehicles',
      timestamps: true,
    }
  );

  return VehicleModel;
}
