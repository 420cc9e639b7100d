import {
  Model,
  DataTypes,
  Sequelize,
  InferAttributes,
  InferCreationAttributes,
  CreationOptional,
} from 'sequelize';
import type { ChatMessage } from '../types/index.js';

/** Advisory chat transcript, addressed by a client-held session id. */
export class ChatSessionModel extends Model<
  InferAttributes<ChatSessionModel>,
  InferCreationAttributes<ChatSessionModel>
> {
  declare id: string;
  declare history: CreationOptional<ChatMessage[]>;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}

export default function chatSessionModel(sequelize: Sequelize): typeof ChatSessionModel {
  ChatSessionModel.init(
    {
      id: {
        type: DataTypes.STRING(64),
        primaryKey: true,
      },
      history: {
        type: DataTypes.JSONB,
        allowNull: false,
        defaultValue: [],
      },
      createdAt: DataTypes.DATE,
      updatedAt: DataTypes.DATE,
    },
    {
      sequelize,
      tableName: 'ChatSessions',
      timestamps: true,
    }
  );

  return ChatSessionModel;
}
