import mongoose, { Document, Schema } from 'mongoose';

export interface IMusicBed extends Document {
  textId: mongoose.Types.ObjectId;
  prompt: string;
  audio?: Buffer;
  createdAt: Date;
  updatedAt: Date;
}

const MusicBedSchema = new Schema<IMusicBed>(
  {
    textId: {
      type: Schema.Types.ObjectId,
      ref: 'Text',
      required: true,
      unique: true,
    },
    prompt: {
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

export const MusicBed = mongoose.model<IMusicBed>('MusicBed', MusicBedSchema);
