import dotenv from 'dotenv';
import { createApp } from './app.js';
import { type AppConfig, loadConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import { ServiceAccountCredentialProvider } from './lib/credentials.js';
import { createBucketUploader } from './lib/storage.js';

dotenv.config();

function main() {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (error) {
        console.error(`Failed to start: ${errorMessage(error)}`);
        process.exit(1);
    }

    const app = createApp({
        defaults: {
            projectId: config.projectId,
            locationId: config.locationId,
            modelId: config.modelId,
        },
        credentials: new ServiceAccountCredentialProvider(config.serviceAccount),
        uploadObject: createBucketUploader(config.serviceAccount),
        bucketName: config.bucketName,
        uploadDir: config.uploadDir,
    });

    app.listen(config.port, () => {
        console.log(`Server is running on http://localhost:${config.port}`);
        if (!config.bucketName) {
            console.warn('BUCKET_NAME is not set; image analysis is disabled.');
        }
    });
}

main();
