import mongoose, { Document, Schema } from 'mongoose';

export interface ISoundEffect extends Document {
  textId: mongoose.Types.ObjectId;
  segmentId?: mongoose.Types.ObjectId;
  name: string;
  startWord: string;
  endWord: string;
  startWordPosition: number;
  endWordPosition: number;
  prompt: string;
  audio?: Buffer;
  startTime?: number;
  endTime?: number;
  rank?: number;
  createdAt: Date;
  updatedAt: Date;
}

const SoundEffectSchema = new Schema<ISoundEffect>(
  {
    textId: {
      type: Schema.Types.ObjectId,
      ref: 'Text',
      required: true,
      index: true,
    },
    segmentId: {
      type: Schema.Types.ObjectId,
      ref: 'Segment',
    },
    name: {
      type: String,
      required: true,
    },
    startWord: {
      type: String,
      required: true,
    },
    endWord: {
      type: String,
      required: true,
    },
    // 1-based positions into the whitespace tokenization of the transcript
    startWordPosition: {
      type: Number,
      required: true,
      min: 1,
    },
    endWordPosition: {
      type: Number,
      required: true,
      min: 1,
    },
    prompt: {
      type: String,
      required: true,
    },
    audio: {
      type: Buffer,
    },
    startTime: {
      type: Number,
    },
    endTime: {
      type: Number,
    },
    rank: {
      type: Number,
    },
  },
  {
    timestamps: true,
  }
);

export const SoundEffect = mongoose.model<ISoundEffect>('SoundEffect', SoundEffectSchema);
