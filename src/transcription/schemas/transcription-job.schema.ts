import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';
import { JobState } from '../../common/enums/job-state.enum';
import {
  JobSegmentRecord,
  JobSegmentRecordSchema,
  PipelineErrorRecord,
  PipelineErrorRecordSchema,
} from './job-segment.schema';

@Schema({ _id: false })
export class MediaInfoRecord {
  @Prop({ required: true })
  durationSeconds!: number;

  @Prop({ required: true })
  sizeBytes!: number;

  @Prop({ required: true })
  hasVideoTrack!: boolean;

  @Prop()
  formatName?: string;
}

export const MediaInfoRecordSchema =
  SchemaFactory.createForClass(MediaInfoRecord);

@Schema({ _id: false })
export class TranscriptResultRecord {
  @Prop({ required: true })
  text!: string;

  @Prop({ required: true })
  billedSeconds!: number;

  @Prop({ required: true })
  costEstimate!: number;

  @Prop({ required: true })
  segmentCount!: number;

  @Prop({ required: true })
  partial!: boolean;

  @Prop({ type: [Number], default: [] })
  failedSegments!: number[];
}

export const TranscriptResultRecordSchema = SchemaFactory.createForClass(
  TranscriptResultRecord,
);

@Schema({
  collection: 'transcription_jobs',
  timestamps: { createdAt: false, updatedAt: true },
})
export class TranscriptionJobRecord extends Document {
  @Prop({ required: true })
  jobId!: string;

  @Prop({ required: true })
  owner!: string;

  @Prop({ required: true })
  sourceRef!: string;

  @Prop({ type: String, default: null })
  originalName!: string | null;

  @Prop({ type: String, enum: JobState, default: JobState.QUEUED })
  state!: JobState;

  @Prop({ type: [JobSegmentRecordSchema], default: [] })
  segments!: JobSegmentRecord[];

  @Prop({ type: MediaInfoRecordSchema, default: null })
  media!: MediaInfoRecord | null;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ type: Date, default: null })
  startedAt!: Date | null;

  @Prop({ type: Date, default: null })
  finishedAt!: Date | null;

  @Prop({ type: PipelineErrorRecordSchema, default: null })
  error!: PipelineErrorRecord | null;

  @Prop({ type: TranscriptResultRecordSchema, default: null })
  result!: TranscriptResultRecord | null;
}

export const TranscriptionJobRecordSchema = SchemaFactory.createForClass(
  TranscriptionJobRecord,
);

// Indexes
TranscriptionJobRecordSchema.index({ jobId: 1 }, { unique: true });
TranscriptionJobRecordSchema.index({ owner: 1, createdAt: -1 });
TranscriptionJobRecordSchema.index({ state: 1 });
