import mongoose, { Document, Schema } from 'mongoose';

export interface ISegment extends Document {
  textId: mongoose.Types.ObjectId;
  characterId: mongoose.Types.ObjectId;
  sequenceIndex: number;
  content: string;
  audio?: Buffer;
  createdAt: Date;
  updatedAt: Date;
}

const SegmentSchema = new Schema<ISegment>(
  {
    textId: {
      type: Schema.Types.ObjectId,
      ref: 'Text',
      required: true,
    },
    characterId: {
      type: Schema.Types.ObjectId,
      ref: 'Character',
      required: true,
    },
    sequenceIndex: {
      type: Number,
      required: true,
      min: 0,
    },
    content: {
      type: String,
      required: true,
    },
    audio: {
      type: Buffer,
    },
  },
  {
    timestamps: true,
  }
);

SegmentSchema.index({ textId: 1, sequenceIndex: 1 }, { unique: true });

export const Segment = mongoose.model<ISegment>('Segment', SegmentSchema);
