import mongoose, { Document, Schema } from 'mongoose';
import { PipelineState } from '../types/production.types';
import { OUTPUT_FORMATS, OutputFormat } from '../types/audio.types';

export interface IExportRecord extends Document {
  textId: mongoose.Types.ObjectId;
  state: PipelineState;
  failure?: {
    code: string;
    message: string;
    missingSegmentIndices?: number[];
  };
  artifact?: {
    uri: string;
    format: OutputFormat;
    byteLength: number;
    durationSec: number;
    createdAt: Date;
  };
  fingerprints?: {
    speech: string;
    effects: string;
    mix: string;
  };
  alignedAt?: Date;
  includedEffectIds: string[];
  omissions: string[];
  createdAt: Date;
  updatedAt: Date;
}

const ExportRecordSchema = new Schema<IExportRecord>(
  {
    textId: {
      type: Schema.Types.ObjectId,
      ref: 'Text',
      required: true,
      unique: true,
    },
    state: {
      type: String,
      enum: Object.values(PipelineState),
      default: PipelineState.AWAITING_SPEECH,
    },
    failure: {
      type: new Schema(
        {
          code: { type: String, required: true },
          message: { type: String, required: true },
          missingSegmentIndices: { type: [Number], default: undefined },
        },
        { _id: false }
      ),
    },
    artifact: {
      type: new Schema(
        {
          uri: { type: String, required: true },
          format: { type: String, enum: [...OUTPUT_FORMATS], required: true },
          byteLength: { type: Number, required: true },
          durationSec: { type: Number, required: true },
          createdAt: { type: Date, required: true },
        },
        { _id: false }
      ),
    },
    fingerprints: {
      type: new Schema(
        {
          speech: { type: String, required: true },
          effects: { type: String, required: true },
          mix: { type: String, required: true },
        },
        { _id: false }
      ),
    },
    alignedAt: {
      type: Date,
    },
    includedEffectIds: {
      type: [String],
      default: [],
    },
    omissions: {
      type: [String],
      default: [],
    },
  },
  {
    timestamps: true,
  }
);

export const ExportRecordModel = mongoose.model<IExportRecord>('ExportRecord', ExportRecordSchema);
