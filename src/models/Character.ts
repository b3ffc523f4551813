import mongoose, { Document, Schema } from 'mongoose';

export interface ICharacter extends Document {
  textId: mongoose.Types.ObjectId;
  name: string;
  voiceId?: string;
  isNarrator: boolean;
  createdAt: Date;
}

const CharacterSchema = new Schema<ICharacter>(
  {
    textId: {
      type: Schema.Types.ObjectId,
      ref: 'Text',
      required: true,
      index: true,
    },
    name: {
      type: String,
      required: true,
    },
    voiceId: {
      type: String,
    },
    isNarrator: {
      type: Boolean,
      default: false,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

export const Character = mongoose.model<ICharacter>('Character', CharacterSchema);
