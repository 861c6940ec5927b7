import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { TranscriptionJobRecord } from './schemas/transcription-job.schema';
import { IJobRepository } from '../common/interfaces/job-repository.interface';
import {
  JobSegment,
  TranscriptionJob,
} from '../common/interfaces/transcription-job.interface';
import { TERMINAL_JOB_STATES } from '../common/enums/job-state.enum';

type JobRecordFields = Omit<TranscriptionJob, 'id'> & { jobId: string };

/** One document per job, segments embedded, keyed by `jobId`. */
@Injectable()
export class JobsRepository implements IJobRepository {
  constructor(
    @InjectModel(TranscriptionJobRecord.name)
    private readonly jobModel: Model<TranscriptionJobRecord>,
  ) {}

  async save(job: TranscriptionJob): Promise<void> {
    await this.jobModel
      .updateOne({ jobId: job.id }, { $set: toRecord(job) }, { upsert: true })
      .exec();
  }

  async findById(jobId: string): Promise<TranscriptionJob | null> {
    const record = await this.jobModel
      .findOne({ jobId })
      .lean<JobRecordFields>()
      .exec();
    return record ? toJob(record) : null;
  }

  async findUnfinished(): Promise<TranscriptionJob[]> {
    const records = await this.jobModel
      .find({ state: { $nin: [...TERMINAL_JOB_STATES] } })
      .sort({ createdAt: 1 })
      .lean<JobRecordFields[]>()
      .exec();
    return records.map(toJob);
  }
}

function toRecord(job: TranscriptionJob): JobRecordFields {
  return {
    jobId: job.id,
    owner: job.owner,
    sourceRef: job.sourceRef,
    originalName: job.originalName,
    state: job.state,
    segments: job.segments.map(toSegment),
    media: job.media,
    createdAt: job.createdAt,
    startedAt: job.startedAt,
    finishedAt: job.finishedAt,
    error: job.error,
    result: job.result,
  };
}

// Lean documents carry _id, __v and updatedAt; copy only the domain fields.
function toJob(record: JobRecordFields): TranscriptionJob {
  return {
    id: record.jobId,
    owner: record.owner,
    sourceRef: record.sourceRef,
    originalName: record.originalName ?? null,
    state: record.state,
    segments: record.segments.map(toSegment),
    media: record.media
      ? {
          durationSeconds: record.media.durationSeconds,
          sizeBytes: record.media.sizeBytes,
          hasVideoTrack: record.media.hasVideoTrack,
          formatName: record.media.formatName,
        }
      : null,
    createdAt: record.createdAt,
    startedAt: record.startedAt ?? null,
    finishedAt: record.finishedAt ?? null,
    error: record.error
      ? { code: record.error.code, message: record.error.message }
      : null,
    result: record.result
      ? {
          text: record.result.text,
          billedSeconds: record.result.billedSeconds,
          costEstimate: record.result.costEstimate,
          segmentCount: record.result.segmentCount,
          partial: record.result.partial,
          failedSegments: [...record.result.failedSegments],
        }
      : null,
  };
}

function toSegment(segment: JobSegment): JobSegment {
  return {
    index: segment.index,
    startOffset: segment.startOffset,
    duration: segment.duration,
    status: segment.status,
    transcodedRef: segment.transcodedRef ?? null,
    recognitionHandle: segment.recognitionHandle ?? null,
    text: segment.text ?? null,
    billedSeconds: segment.billedSeconds ?? null,
    error: segment.error
      ? { code: segment.error.code, message: segment.error.message }
      : null,
  };
}
