import {
  Model,
  DataTypes,
  Sequelize,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
} from 'sequelize';
import { fuelTypes, type FuelType } from '../types/index.js';

/** Cached aggregate market prices, one row per make/model/year/fuel. */
export class MarketDataModel extends Model<
  InferAttributes<MarketDataModel>,
  InferCreationAttributes<MarketDataModel>
> {
  declare id: CreationOptional<number>;
  declare make: string;
  declare model: string;
  declare year: number;
  declare fuelType: FuelType;
  declare averagePrice: number;
  declare priceMin: number;
  declare priceMax: number;
  declare mileageAverage: number | null;
  declare listingsCount: number;
  declare lastUpdated: Date;
}

export default function marketDataModel(sequelize: Sequelize): typeof MarketDataModel {
  MarketDataModel.init(
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      make: { type: DataTypes.STRING(100), allowNull: false },
      model: { type: DataTypes.STRING(100), allowNull: false },
      year: { type: DataTypes.INTEGER, allowNull: false },
      fuelType: { type: DataTypes.ENUM(...fuelTypes), allowNull: false },
      averagePrice: { type: DataTypes.DOUBLE, allowNull: false },
      priceMin: { type: DataTypes.DOUBLE, allowNull: false },
      priceMax: { type: DataTypes.DOUBLE, allowNull: false },
      mileageAverage: DataTypes.INTEGER,
      listingsCount: { type: DataTypes.INTEGER, allowNull: false },
      lastUpdated: { type: DataTypes.DATE, allowNull: false },
    },
    {
      sequelize,
      tableName: 'MarketData',
      timestamps: false,
      indexes: [
        {
          unique: true,
          fields: ['make', 'model', 'year', 'fuelType'],
        },
      ],
    }
  );

  return MarketDataModel;
}
