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
  negotiationStatuses,
  offerKinds,
  type ChatMessage,
  type NegotiationStatus,
  type OfferKind,
} from '../types/index.js';

export class NegotiationModel extends Model<
  InferAttributes<NegotiationModel>,
  InferCreationAttributes<NegotiationModel>
> {
  declare id: CreationOptional<string>;
  declare clientId: ForeignKey<number>;
  declare tradeInVehicleId: ForeignKey<number> | null;
  declare targetVehicleId: ForeignKey<number> | null;
  declare status: CreationOptional<NegotiationStatus>;
  declare roundCounter: CreationOptional<number>;
  declare maxRounds: number;
  declare marginTarget: number;
  declare tradeInOfferedValue: number | null;
  declare finalPrice: number | null;
  declare marginAchieved: number | null;
  declare chosenOfferKind: OfferKind | null;
  declare marketAnalysis: CreationOptional<Record<string, unknown>>;
  declare agentReasoning: CreationOptional<Record<string, unknown>>;
  declare conversation: CreationOptional<ChatMessage[]>;
  declare startedAt: CreationOptional<Date>;
  declare endedAt: Date | null;
  declare updatedAt: CreationOptional<Date>;

  static associate(models: Record<string, ModelStatic<Model>>): void {
    this.belongsTo(models.Client, {
      foreignKey: 'clientId',
      as: 'Client',
    });
    this.belongsTo(models.Vehicle, {
      foreignKey: 'tradeInVehicleId',
      as: 'TradeInVehicle',
    });
    this.belongsTo(models.Vehicle, {
      foreignKey: 'targetVehicleId',
      as: 'TargetVehicle',
    });
    this.hasMany(models.Offer, {
      foreignKey: 'negotiationId',
      as: 'Offers',
      onDelete: 'CASCADE',
    });
    this.hasMany(models.NegotiationRound, {
      foreignKey: 'negotiationId',
      as: 'Rounds',
      onDelete: 'CASCADE',
    });
  }
}

export default function negotiationModel(sequelize: Sequelize): typeof NegotiationModel {
  NegotiationModel.init(
    {
      id: {
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
        primaryKey: true,
      },
      clientId: { type: DataTypes.INTEGER, allowNull: false },
      tradeInVehicleId: DataTypes.INTEGER,
      targetVehicleId: DataTypes.INTEGER,
      status: {
        type: DataTypes.ENUM(...negotiationStatuses),
        defaultValue: 'initiated',
      },
      roundCounter: {
        type: DataTypes.INTEGER,
        defaultValue: 0,
        validate: { min: 0 },
      },
      maxRounds: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 10,
      },
      marginTarget: {
        type: DataTypes.FLOAT,
        allowNull: false,
        defaultValue: 0.15,
      },
      tradeInOfferedValue: DataTypes.DOUBLE,
      finalPrice: DataTypes.DOUBLE,
      marginAchieved: DataTypes.FLOAT,
      chosenOfferKind: DataTypes.ENUM(...offerKinds),
      marketAnalysis: {
        type: DataTypes.JSONB,
        defaultValue: {},
      },
      agentReasoning: {
        type: DataTypes.JSONB,
        defaultValue: {},
      },
      conversation: {
        type: DataTypes.JSONB,
        defaultValue: [],
      },
      startedAt: DataTypes.DATE,
      endedAt: DataTypes.DATE,
      updatedAt: DataTypes.DATE,
    },
    {
      sequelize,
      tableName: 'Negotiations',
      timestamps: true,
      createdAt: 'startedAt',
      validate: {
        roundsWithinLimit(this: NegotiationModel) {
          if (this.roundCounter > this.maxRounds) {
            throw new Error('roundCounter cannot exceed maxRounds');
          }
        },
      },
    }
  );

  return NegotiationModel;
}
