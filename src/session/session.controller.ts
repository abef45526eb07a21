import {
  BadRequestException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';

import { REPORT_FILE_NAME } from '../presentation';
import { SessionId } from './decorators/session-id.decorator';
import { GcpConfiguredGuard } from './guards/gcp-configured.guard';
import { AnalysisView, SessionView } from './interfaces';
import { VIDEO_FIELD_NAME } from './session.constants';
import { SessionService } from './session.service';
import { decodeMultipartFileName } from './utils/multipart-file-name.util';

@Controller('session')
@UseGuards(GcpConfiguredGuard)
export class SessionController {
  constructor(private readonly sessionService: SessionService) {}

  @Get()
  public getSession(@SessionId() sessionId: string): Promise<SessionView> {
    return this.sessionService.getSession(sessionId);
  }

  /**
   * Uploads a video from the `video` multipart field to object storage.
   *
   * @returns {Promise<SessionView>} The session with its new upload.
   */
  @Post('video')
  @UseInterceptors(FileInterceptor(VIDEO_FIELD_NAME))
  public uploadVideo(
    @SessionId() sessionId: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<SessionView> {
    if (!file) {
      throw new BadRequestException(
        `A video file is required in the "${VIDEO_FIELD_NAME}" field`,
      );
    }

    return this.sessionService.uploadVideo(sessionId, {
      originalName: decodeMultipartFileName(file.originalname),
      contentType: file.mimetype,
      sizeBytes: file.size,
      buffer: file.buffer,
    });
  }

  /**
   * Runs the brand compatibility analysis on the uploaded video.
   */
  @Post('analysis')
  @HttpCode(HttpStatus.OK)
  public analyze(@SessionId() sessionId: string): Promise<AnalysisView> {
    return this.sessionService.analyze(sessionId);
  }

  @Get('analysis')
  public getAnalysis(@SessionId() sessionId: string): Promise<AnalysisView> {
    return this.sessionService.getAnalysis(sessionId);
  }

  @Get('report.pdf')
  public async getReport(
    @SessionId() sessionId: string,
  ): Promise<StreamableFile> {
    const pdf = await this.sessionService.getReport(sessionId);

    return new StreamableFile(pdf, {
      type: 'application/pdf',
      disposition: `attachment; filename="${REPORT_FILE_NAME}"`,
      length: pdf.length,
    });
  }

  @Delete()
  @HttpCode(HttpStatus.OK)
  public reset(@SessionId() sessionId: string): Promise<SessionView> {
    return this.sessionService.reset(sessionId);
  }
}
