import type { RequestHandler } from 'express';
import { formidable } from 'formidable';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { sendError } from '../lib/errors.js';
import type { ObjectUploader } from '../lib/storage.js';
import { buildImageAnalysisRequest } from '../services/payloadBuilder.js';
import { type GenerationDeps, TargetOverrideSchema, generateText } from '../services/generationService.js';

export const IMAGE_MIME_TYPES = ['image/jpeg', 'image/png'];

const AnalysisFieldsSchema = TargetOverrideSchema.extend({
    query: z.string().trim().min(1),
});

export interface ImageAnalysisDeps extends GenerationDeps {
    bucketName?: string;
    uploadObject: ObjectUploader;
    /** Where formidable writes multipart files; the OS temp dir when unset. */
    uploadDir?: string;
}

export const createImageAnalysisHandler = (deps: ImageAnalysisDeps): RequestHandler => async (req, res) => {
    const { bucketName } = deps;
    if (!bucketName) {
        return res.status(503).json({ message: 'Image analysis is not configured: BUCKET_NAME is not set.' });
    }

    if (!req.is('multipart/form-data')) {
        return res.status(400).json({ message: 'Expected a multipart/form-data request.' });
    }

    const form = formidable(deps.uploadDir ? { uploadDir: deps.uploadDir } : {});
    let tempFilepaths: string[] = [];

    try {
        const [fields, files] = await form.parse(req);
        // Every file part lands on disk, not just the image.
        tempFilepaths = Object.values(files).flatMap(list => list ?? []).map(file => file.filepath);

        const image = files.image?.[0];
        if (!image) {
            return res.status(400).json({ message: 'No image uploaded.' });
        }
        const mimeType = image.mimetype;
        if (!mimeType || !IMAGE_MIME_TYPES.includes(mimeType)) {
            return res.status(400).json({ message: 'Only JPEG and PNG images are supported.' });
        }

        const parse = AnalysisFieldsSchema.safeParse({
            query: fields.query?.[0],
            projectId: fields.projectId?.[0],
            locationId: fields.locationId?.[0],
            modelId: fields.modelId?.[0],
        });
        if (!parse.success) {
            return res.status(400).json({ message: 'Invalid request', details: parse.error.flatten() });
        }
        const { query, ...override } = parse.data;

        const fileName = image.originalFilename || path.basename(image.filepath);
        console.log(`[image-analysis] Uploading ${fileName} to ${bucketName}...`);
        const fileUri = await deps.uploadObject({
            bucketName,
            filePath: image.filepath,
            fileName,
            contentType: mimeType,
        });

        const request = buildImageAnalysisRequest(query, { mimeType, fileUri });
        const text = await generateText(deps, request, override);

        res.status(200).json({ text, fileUri });
    } catch (error) {
        console.error('[image-analysis] Error analyzing image:', error);
        sendError(res, error, 'Failed to analyze image.');
    } finally {
        for (const filepath of tempFilepaths) {
            fs.rmSync(filepath, { force: true });
        }
    }
};
