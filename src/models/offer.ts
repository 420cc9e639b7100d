import {
  Model,
  DataTypes,
  Sequelize,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
  ForeignKey,
  ModelStatic,
} from 'sequelize';
import {
  MAX_DURATION_MONTHS,
  MIN_DURATION_MONTHS,
  offerKinds,
  offerStatuses,
  type OfferKind,
  type OfferStatus,
} from '../types/index.js';

export class OfferModel extends Model<
  InferAttributes<OfferModel>,
  InferCreationAttributes<OfferModel>
> {
  declare id: CreationOptional<number>;
  declare negotiationId: ForeignKey<string>;
  declare kind: OfferKind;
  declare vehicleId: ForeignKey<number> | null;
  declare tradeInValue: number;
  declare purchasePrice: number | null;
  declare monthlyPayment: number | null;
  declare durationMonths: number | null;
  declare totalCost: number;
  declare warrantyMonths: CreationOptional<number>;
  declare maintenanceIncluded: CreationOptional<boolean>;
  declare roadsideAssistance: CreationOptional<boolean>;
  declare insuranceIncluded: CreationOptional<boolean>;
  declare justification: string;
  declare confidenceScore: number;
  declare status: CreationOptional<OfferStatus>;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;

  static associate(models: Record<string, ModelStatic<Model>>): void {
    this.belongsTo(models.Negotiation, {
      foreignKey: 'negotiationId',
      as: 'Negotiation',
    });
    this.belongsTo(models.Vehicle, {
      foreignKey: 'vehicleId',
      as: 'Vehicle',
    });
  }
}

export default function offerModel(sequelize: Sequelize): typeof OfferModel {
  OfferModel.init(
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      negotiationId: { type: DataTypes.UUID, allowNull: false },
      kind: { type: DataTypes.ENUM(...offerKinds), allowNull: false },
      vehicleId: DataTypes.INTEGER,
      tradeInValue: { type: DataTypes.DOUBLE, allowNull: false, defaultValue: 0 },
      purchasePrice: DataTypes.DOUBLE,
      monthlyPayment: DataTypes.DOUBLE,
      durationMonths: {
        type: DataTypes.INTEGER,
        validate: { min: MIN_DURATION_MONTHS, max: MAX_DURATION_MONTHS },
      },
      totalCost: {
        type: DataTypes.DOUBLE,
        allowNull: false,
        validate: { min: 0 },
      },
      warrantyMonths: { type: DataTypes.INTEGER, defaultValue: 12 },
      maintenanceIncluded: { type: DataTypes.BOOLEAN, defaultValue: false },
      roadsideAssistance: { type: DataTypes.BOOLEAN, defaultValue: false },
      insuranceIncluded: { type: DataTypes.BOOLEAN, defaultValue: false },
      justification: { type: DataTypes.TEXT, allowNull: false, defaultValue: '' },
      confidenceScore: {
        type: DataTypes.FLOAT,
        allowNull: false,
        validate: { min: 0, max: 100 },
      },
      status: {
        type: DataTypes.ENUM(...offerStatuses),
        defaultValue: 'proposed',
      },
      createdAt: DataTypes.DATE,
      updatedAt: DataTypes.DATE,
    },
    {
      sequelize,
      tableName: 'Offers',
      timestamps: true,
    }
  );

  return OfferModel;
}
