import { Router } from 'express';
import type { RequestHandler } from 'express';
import multer from 'multer';
import { z } from 'zod';

import type { OptimizeRequest } from '../types';
import { asyncRoute, pipelineOf, sendValidationErrors, uploadLimitOf } from './http';

const router = Router();

const optionalText = z.string().optional();

const formSchema = z.object({
  resume_text: optionalText,
  job_url: optionalText,
  job_text: optionalText,
});

const jsonSchema = z.object({
  resume_text: z
    .string({ required_error: 'resume_text is required' })
    .min(1, 'resume_text is required'),
  job_url: optionalText,
  job_text: optionalText,
});

const storage = multer.memoryStorage();

// The size limit is an app setting, so the multer instance is built per request.
const uploadResume: RequestHandler = (req, res, next) => {
  multer({ storage, limits: { fileSize: uploadLimitOf(req), files: 1 } }).single('resume_file')(req, res, next);
};

router.post(
  '/optimize',
  uploadResume,
  asyncRoute(async (req, res) => {
    const validation = formSchema.safeParse(req.body ?? {});

    if (!validation.success) {
      sendValidationErrors(res, validation.error.issues);
      return;
    }

    const { resume_text, job_url, job_text } = validation.data;
    const request: OptimizeRequest = {
      resumeText: resume_text,
      jobUrl: job_url,
      jobText: job_text,
    };

    if (req.file) {
      request.resumeFile = {
        bytes: req.file.buffer,
        filename: req.file.originalname,
        mimeType: req.file.mimetype,
      };
    }

    const record = await pipelineOf(req).optimize(request);
    res.status(201).json(record);
  }),
);

router.post(
  '/optimize-json',
  asyncRoute(async (req, res) => {
    const validation = jsonSchema.safeParse(req.body ?? {});

    if (!validation.success) {
      sendValidationErrors(res, validation.error.issues);
      return;
    }

    const { resume_text, job_url, job_text } = validation.data;
    const record = await pipelineOf(req).optimize({ resumeText: resume_text, jobUrl: job_url, jobText: job_text });

    res.status(201).json(record);
  }),
);

export default router;
