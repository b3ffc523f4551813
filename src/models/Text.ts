import mongoose, { Document, Schema } from 'mongoose';

export interface IWordTimestamp {
  word: string;
  start: number;
  end: number;
}

export interface IText extends Document {
  title?: string;
  content: string;
  analyzed: boolean;
  /** Derived from the speech timeline; cleared when any segment audio changes */
  wordTimestamps?: IWordTimestamp[];
  alignedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const WordTimestampSchema = new Schema<IWordTimestamp>(
  {
    word: { type: String, required: true },
    start: { type: Number, required: true },
    end: { type: Number, required: true },
  },
  { _id: false }
);

const TextSchema = new Schema<IText>(
  {
    title: {
      type: String,
    },
    content: {
      type: String,
      required: true,
    },
    analyzed: {
      type: Boolean,
      default: false,
    },
    wordTimestamps: {
      type: [WordTimestampSchema],
      default: undefined,
    },
    alignedAt: {
      type: Date,
    },
  },
  {
    timestamps: true,
  }
);

export const Text = mongoose.model<IText>('Text', TextSchema);
