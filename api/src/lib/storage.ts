import { Storage } from '@google-cloud/storage';
import type { ServiceAccount } from './credentials.js';
import { StorageUploadError, errorMessage } from './errors.js';

export interface UploadRequest {
    bucketName: string;
    /** Local path of the file to stream, e.g. a multipart temp file. */
    filePath: string;
    fileName: string;
    contentType: string;
}

export type ObjectUploader = (request: UploadRequest) => Promise<string>;

export function objectUri(bucketName: string, fileName: string): string {
    return `gs://${bucketName}/${fileName}`;
}

/**
 * Returns an uploader that writes objects with the given service account and
 * resolves to their `gs://` URI.
 */
export function createBucketUploader(account: ServiceAccount): ObjectUploader {
    return async ({ bucketName, filePath, fileName, contentType }) => {
        try {
            const storage = new Storage({
                projectId: account.project_id,
                credentials: {
                    client_email: account.client_email,
                    private_key: account.private_key,
                },
            });
            await storage.bucket(bucketName).upload(filePath, {
                destination: fileName,
                contentType,
            });
        } catch (error) {
            console.error(`[storage] Upload of ${fileName} to ${bucketName} failed:`, error);
            throw new StorageUploadError(errorMessage(error));
        }
        console.log(`[storage] Uploaded ${fileName} to ${bucketName}`);
        return objectUri(bucketName, fileName);
    };
}
