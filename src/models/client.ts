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
  offerPreferences,
  transmissions,
  type FuelType,
  type OfferPreference,
  type Transmission,
} from '../types/index.js';

export class ClientModel extends Model<
  InferAttributes<ClientModel>,
  InferCreationAttributes<ClientModel>
> {
  declare id: CreationOptional<number>;
  declare firstName: string;
  declare lastName: string;
  declare email: string;
  declare phone: string | null;
  declare address: string | null;
  declare city: string | null;
  declare postalCode: string | null;
  declare preferredFuel: FuelType | null;
  declare preferredTransmission: Transmission | null;
  declare budgetMin: number | null;
  declare budgetMax: number | null;
  declare offerPreference: CreationOptional<OfferPreference>;
  declare loyaltyScore: CreationOptional<number>;
  declare riskScore: CreationOptional<number>;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;

  static associate(models: Record<string, ModelStatic<Model>>): void {
    this.hasMany(models.Negotiation, {
      foreignKey: 'clientId',
      as: 'Negotiations',
      onDelete: 'CASCADE',
    });
  }
}

export default function clientModel(sequelize: Sequelize): typeof ClientModel {
  ClientModel.init(
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      firstName: { type: DataTypes.STRING(100), allowNull: false },
      lastName: { type: DataTypes.STRING(100), allowNull: false },
      email: {
        type: DataTypes.STRING,
        allowNull: false,
        unique: true,
        validate: { isEmail: true },
      },
      phone: DataTypes.STRING(20),
      address: DataTypes.STRING(200),
      city: DataTypes.STRING(100),
      postalCode: DataTypes.STRING(10),
      preferredFuel: DataTypes.ENUM(...fuelTypes),
      preferredTransmission: DataTypes.ENUM(...transmissions),
      budgetMin: DataTypes.DOUBLE,
      budgetMax: DataTypes.DOUBLE,
      offerPreference: {
        type: DataTypes.ENUM(...offerPreferences),
        defaultValue: 'flexible',
      },
      loyaltyScore: {
        type: DataTypes.FLOAT,
        defaultValue: 0,
        validate: { min: 0, max: 1 },
      },
      riskScore: {
        type: DataTypes.FLOAT,
        defaultValue: 0,
        validate: { min: 0, max: 1 },
      },
      createdAt: DataTypes.DATE,
      updatedAt: DataTypes.DATE,
    },
    {
      sequelize,
      tableName: 'Clients',
      timestamps: true,
    }
  );

  return ClientModel;
}
