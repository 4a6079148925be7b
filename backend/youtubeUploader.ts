import fs from 'fs';
import { google } from 'googleapis';
import type { Config } from './config';
import { UploadError, errorMessage } from './errors';
import { logger } from './logger';
import type { UploadMetadata } from './metadataService';

export type UploadResult = { videoId: string; url: string };

export interface VideoUploader {
  upload(videoPath: string, metadata: UploadMetadata): Promise<UploadResult>;
}

export type YoutubeSettings = {
  categoryId: string;
  privacyStatus: string;
  madeForKids: boolean;
};

export type VideoInsertRequest = {
  part: string[];
  requestBody: {
    snippet: { title: string; description: string; tags: string[]; categoryId: string };
    status: { privacyStatus: string; selfDeclaredMadeForKids: boolean };
  };
  media: { body: NodeJS.ReadableStream };
};

/** The one Data API call we make; returns the new video id. */
export type VideoInsert = (request: VideoInsertRequest) => Promise<string | null | undefined>;

export function googleVideoInsert(clientId: string, clientSecret: string, refreshToken: string): VideoInsert {
  const oauth2 = new google.auth.OAuth2(clientId, clientSecret);
  oauth2.setCredentials({ refresh_token: refreshToken });
  const yt = google.youtube({ version: 'v3', auth: oauth2 });
  return async (request) => {
    const res = await yt.videos.insert(request);
    return res.data.id;
  };
}

export function insertRequest(videoPath: string, metadata: UploadMetadata, settings: YoutubeSettings): VideoInsertRequest {
  return {
    part: ['snippet', 'status'],
    requestBody: {
      snippet: {
        title: metadata.title.slice(0, 100),
        description: metadata.description.slice(0, 5000),
        tags: metadata.tags,
        categoryId: settings.categoryId
      },
      status: { privacyStatus: settings.privacyStatus, selfDeclaredMadeForKids: settings.madeForKids }
    },
    media: { body: fs.createReadStream(videoPath) }
  };
}

export class YoutubeUploader implements VideoUploader {
  constructor(
    private readonly insert: VideoInsert,
    private readonly settings: YoutubeSettings
  ) {}

  async upload(videoPath: string, metadata: UploadMetadata): Promise<UploadResult> {
    if (!fs.existsSync(videoPath)) throw new UploadError(`Video not found: ${videoPath}`);
    logger.step('UPLOAD', 'Uploading to YouTube', { title: metadata.title });
    let videoId: string | null | undefined;
    try {
      videoId = await this.insert(insertRequest(videoPath, metadata, this.settings));
    } catch (err) {
      throw new UploadError(`YouTube upload failed: ${errorMessage(err)}`, err);
    }
    if (!videoId) throw new UploadError('YouTube accepted the upload but returned no video id');
    const url = `https://youtube.com/shorts/${videoId}`;
    logger.step('UPLOAD', `Uploaded ${url}`);
    return { videoId, url };
  }
}

/** null unless all three OAuth values are present. */
export function createUploader(cfg: Config): VideoUploader | null {
  const { clientId, clientSecret, refreshToken, categoryId, privacyStatus, madeForKids } = cfg.youtube;
  if (!clientId || !clientSecret || !refreshToken) return null;
  return new YoutubeUploader(googleVideoInsert(clientId, clientSecret, refreshToken), {
    categoryId,
    privacyStatus,
    madeForKids
  });
}
