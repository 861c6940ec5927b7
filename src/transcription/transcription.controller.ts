import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  ParseFilePipe,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { rm } from 'fs/promises';
import { extname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';

import { TranscriptionOrchestrator } from './transcription.orchestrator';
import { CreateJobDto } from './dto/create-job.dto';
import { JobView, toJobView } from './dto/job-view';
import { StorageService } from '../common/providers/storage/storage.service';
import { MIMES } from '../common/constants/mimes.constant';
import {
  JobNotCancelableException,
  JobNotFoundException,
} from '../common/exceptions/job.exception';
import { getErrorMessage } from '../common/utils/error.utils';

@Controller('jobs')
export class TranscriptionController {
  private readonly logger = new Logger(TranscriptionController.name);

  constructor(
    private readonly orchestrator: TranscriptionOrchestrator,
    private readonly storageService: StorageService,
  ) {}

  private static getMaxUploadSize(): number {
    const maxUploadSizeMB = parseInt(
      process.env.MAX_UPLOAD_SIZE_MB || '2048',
      10,
    );
    return maxUploadSizeMB * 1024 * 1024;
  }

  private static getUploadDir(): string {
    return join(process.env.TMP_DIR || '/tmp/transcribe', 'incoming');
  }

  @Post()
  @UseInterceptors(
    FileInterceptor('file', {
      dest: TranscriptionController.getUploadDir(),
      limits: {
        fileSize: TranscriptionController.getMaxUploadSize(),
      },
      fileFilter: (req, file, callback) => {
        if (MIMES.includes(file.mimetype)) {
          callback(null, true);
        } else {
          callback(new BadRequestException('Invalid file type'), false);
        }
      },
    }),
  )
  async createJob(
    @UploadedFile(
      new ParseFilePipe({
        fileIsRequired: true,
      }),
    )
    file: Express.Multer.File,
    @Body() body: unknown,
  ): Promise<{ job: JobView; queuePosition: number }> {
    const dto = plainToInstance(CreateJobDto, body);
    const errors = await validate(dto, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });
    if (errors.length > 0) {
      await this.discardUpload(file.path);
      throw new BadRequestException(errors);
    }

    let sourceRef: string;
    try {
      sourceRef = await this.storageService.storeFile(
        file.path,
        `uploads/${uuidv4()}${extname(file.originalname)}`,
      );
    } finally {
      await this.discardUpload(file.path);
    }

    const { job, position } = await this.orchestrator.submit({
      owner: dto.owner,
      sourceRef,
      originalName: file.originalname,
    });
    return { job: toJobView(job), queuePosition: position };
  }

  @Get(':id')
  async getJob(@Param('id') id: string): Promise<JobView> {
    const job = await this.orchestrator.getJob(id);
    if (!job) {
      throw new NotFoundException(`Job not found: ${id}`);
    }
    return toJobView(job);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  async cancelJob(@Param('id') id: string): Promise<JobView> {
    try {
      return toJobView(await this.orchestrator.cancel(id));
    } catch (error) {
      if (error instanceof JobNotFoundException) {
        throw new NotFoundException(error.message);
      }
      if (error instanceof JobNotCancelableException) {
        throw new ConflictException(error.message);
      }
      throw error;
    }
  }

  private async discardUpload(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (error) {
      this.logger.warn(
        `Could not remove upload ${path}: ${getErrorMessage(error)}`,
      );
    }
  }
}
