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
import { roundStatuses, type ProposedTerms, type RoundStatus } from '../types/index.js';

/** Append-only: rounds are created once and never updated. */
export class NegotiationRoundModel extends Model<
  InferAttributes<NegotiationRoundModel>,
  InferCreationAttributes<NegotiationRoundModel>
> {
  declare id: CreationOptional<string>;
  declare negotiationId: ForeignKey<string>;
  declare roundNumber: number;
  declare agentProposal: ProposedTerms;
  declare agentReasoning: string;
  declare clientFeedback: string | null;
  declare clientCounterProposal: ProposedTerms | null;
  declare roundStatus: CreationOptional<RoundStatus>;
  declare createdAt: CreationOptional<Date>;

  static associate(models: Record<string, ModelStatic<Model>>): void {
    this.belongsTo(models.Negotiation, {
      foreignKey: 'negotiationId',
      as: 'Negotiation',
    });
  }
}

export default function negotiationRoundModel(sequelize: Sequelize): typeof NegotiationRoundModel {
  NegotiationRoundModel.init(
    {
      id: {
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
        primaryKey: true,
      },
      negotiationId: { type: DataTypes.UUID, allowNull: false },
      roundNumber: {
        type: DataTypes.INTEGER,
        allowNull: false,
        validate: { min: 1 },
      },
      agentProposal: {
        type: DataTypes.JSONB,
        allowNull: false,
        defaultValue: {},
      },
      agentReasoning: {
        type: DataTypes.TEXT,
        allowNull: false,
        defaultValue: '',
      },
      clientFeedback: DataTypes.TEXT,
      clientCounterProposal: DataTypes.JSONB,
      roundStatus: {
        type: DataTypes.ENUM(...roundStatuses),
        defaultValue: 'ongoing',
      },
      createdAt: DataTypes.DATE,
    },
    {
      sequelize,
      tableName: 'NegotiationRounds',
      timestamps: true,
      updatedAt: false,
      indexes: [
        {
          unique: true,
          fields: ['negotiationId', 'roundNumber'],
        },
      ],
    }
  );

  return NegotiationRoundModel;
}
