import { Test, TestingModule } from '@nestjs/testing';
import { rm } from 'fs/promises';
import { MediaService } from './media.service';
import { FfmpegService } from '../../services/ffmpeg/ffmpeg.service';
import { StorageService } from '../../common/providers/storage/storage.service';
import { pipelineConfig } from '../../common/config/pipeline.config';
import {
  TranscodeException,
  UnreadableMediaException,
} from '../../common/exceptions/pipeline.exception';

jest.mock('fs/promises', () => ({
  rm: jest.fn().mockResolvedValue(undefined),
}));

describe('MediaService', () => {
  let service: MediaService;
  let ffmpegService: { probe: jest.Mock; extractAudioSegment: jest.Mock };
  let storageService: {
    fetchUrl: jest.Mock;
    getSize: jest.Mock;
    storeFile: jest.Mock;
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    ffmpegService = { probe: jest.fn(), extractAudioSegment: jest.fn() };
    storageService = {
      fetchUrl: jest.fn().mockResolvedValue('https://signed/source.mp4'),
      getSize: jest.fn(),
      storeFile: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MediaService,
        { provide: FfmpegService, useValue: ffmpegService },
        { provide: StorageService, useValue: storageService },
        {
          provide: pipelineConfig.KEY,
          useValue: { tmpDir: '/tmp/transcribe', sampleRateHertz: 16000 },
        },
      ],
    }).compile();

    service = module.get<MediaService>(MediaService);
  });

  describe('probe', () => {
    it('should combine ffprobe output with the stored size', async () => {
      ffmpegService.probe.mockResolvedValue({
        durationSeconds: 18000,
        hasVideoTrack: true,
        formatName: 'mov,mp4,m4a',
      });
      storageService.getSize.mockResolvedValue(524288000);

      await expect(service.probe('uploads/source.mp4')).resolves.toEqual({
        durationSeconds: 18000,
        sizeBytes: 524288000,
        hasVideoTrack: true,
        formatName: 'mov,mp4,m4a',
      });
      expect(ffmpegService.probe).toHaveBeenCalledWith(
        'https://signed/source.mp4',
      );
    });

    it('should report a missing source as unreadable media', async () => {
      storageService.fetchUrl.mockRejectedValue(new Error('No such object'));

      await expect(service.probe('uploads/gone.mp4')).rejects.toThrow(
        new UnreadableMediaException(
          'Source could not be read: No such object',
        ),
      );
    });
  });

  describe('transcode', () => {
    const target = {
      jobId: 'job-1',
      index: 1,
      startOffset: 9000,
      duration: 9000,
      hasVideoTrack: true,
    };

    it('should extract the range, store it and clean the temp file', async () => {
      ffmpegService.extractAudioSegment.mockResolvedValue(
        '/tmp/transcribe/job-1/segment-001.wav',
      );
      storageService.storeFile.mockResolvedValue(
        'jobs/job-1/segment-001.wav',
      );

      const ref = await service.transcode('uploads/source.mp4', target);

      expect(ref).toBe('jobs/job-1/segment-001.wav');
      expect(ffmpegService.extractAudioSegment).toHaveBeenCalledWith(
        'https://signed/source.mp4',
        '/tmp/transcribe/job-1/segment-001.wav',
        {
          startOffset: 9000,
          duration: 9000,
          sampleRateHertz: 16000,
          dropVideo: true,
        },
      );
      expect(storageService.storeFile).toHaveBeenCalledWith(
        '/tmp/transcribe/job-1/segment-001.wav',
        'jobs/job-1/segment-001.wav',
      );
      expect(rm).toHaveBeenCalledWith(
        '/tmp/transcribe/job-1/segment-001.wav',
        { force: true },
      );
    });

    it('should pass ffmpeg failures through as TranscodeException', async () => {
      const failure = new TranscodeException('Unsupported codec');
      ffmpegService.extractAudioSegment.mockRejectedValue(failure);

      await expect(
        service.transcode('uploads/source.mp4', target),
      ).rejects.toBe(failure);
      expect(rm).toHaveBeenCalled();
    });

    it('should hand the abort signal to ffmpeg', async () => {
      const controller = new AbortController();
      ffmpegService.extractAudioSegment.mockResolvedValue('/tmp/x.wav');
      storageService.storeFile.mockResolvedValue('jobs/job-1/segment-001.wav');

      await service.transcode('uploads/source.mp4', target, controller.signal);

      expect(ffmpegService.extractAudioSegment).toHaveBeenCalledWith(
        'https://signed/source.mp4',
        '/tmp/transcribe/job-1/segment-001.wav',
        expect.objectContaining({ signal: controller.signal }),
      );
    });

    it('should classify storage failures as TranscodeException', async () => {
      ffmpegService.extractAudioSegment.mockResolvedValue('/tmp/x.wav');
      storageService.storeFile.mockRejectedValue(new Error('quota exceeded'));

      await expect(
        service.transcode('uploads/source.mp4', target),
      ).rejects.toThrow(
        'Segment 1 could not be transcoded: quota exceeded',
      );
    });
  });

  it('should remove the job work directory', async () => {
    await service.removeWorkDir('job-1');

    expect(rm).toHaveBeenCalledWith('/tmp/transcribe/job-1', {
      recursive: true,
      force: true,
    });
  });
});
