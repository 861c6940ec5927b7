import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { SegmentStatus } from '../../common/enums/segment-status.enum';
import { PipelineErrorCode } from '../../common/enums/pipeline-error-code.enum';

@Schema({ _id: false })
export class PipelineErrorRecord {
  @Prop({ type: String, enum: PipelineErrorCode, required: true })
  code!: PipelineErrorCode;

  @Prop({ required: true })
  message!: string;
}

export const PipelineErrorRecordSchema =
  SchemaFactory.createForClass(PipelineErrorRecord);

@Schema({ _id: false })
export class JobSegmentRecord {
  @Prop({ required: true })
  index!: number;

  @Prop({ required: true })
  startOffset!: number; // seconds from the start of the source

  @Prop({ required: true })
  duration!: number;

  @Prop({
    type: String,
    enum: SegmentStatus,
    default: SegmentStatus.PENDING,
  })
  status!: SegmentStatus;

  @Prop({ type: String, default: null })
  transcodedRef!: string | null;

  @Prop({ type: String, default: null })
  recognitionHandle!: string | null;

  @Prop({ type: String, default: null })
  text!: string | null;

  @Prop({ type: Number, default: null })
  billedSeconds!: number | null;

  @Prop({ type: PipelineErrorRecordSchema, default: null })
  error!: PipelineErrorRecord | null;
}

export const JobSegmentRecordSchema =
  SchemaFactory.createForClass(JobSegmentRecord);
