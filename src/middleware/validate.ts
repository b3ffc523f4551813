import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { AppError } from './errorHandler';
import { OUTPUT_FORMATS } from '../types/audio.types';

export const validate = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const errorMessage = error.details
        .map((detail) => detail.message)
        .join(', ');
      throw new AppError(errorMessage, 400);
    }

    // Replace request body with validated value
    req.body = value;
    next();
  };
};

const mixConfig = Joi.object({
  backgroundGain: Joi.number().min(0).max(2).optional(),
  effectGain: Joi.number().min(0).max(2).optional(),
  targetLufs: Joi.number().min(-70).max(-5).optional(),
  truePeakDb: Joi.number().min(-9).max(0).optional(),
  segmentPaddingSec: Joi.number().min(0).max(10).optional(),
  outputFormat: Joi.string().valid(...OUTPUT_FORMATS).optional(),
  musicFadeInSec: Joi.number().min(0).max(30).optional(),
  musicFadeOutSec: Joi.number().min(0).max(30).optional(),
  headroomDb: Joi.number().min(0).max(20).optional(),
});

export const schemas = {
  exportRequest: Joi.object({
    mixConfig: mixConfig.optional(),
    force: Joi.boolean().default(false),
    generateMissing: Joi.boolean().default(false),
  }),

  artifactReady: Joi.object({
    kind: Joi.string().valid('speech', 'effect', 'music').required(),
    id: Joi.string().min(1).required(),
    status: Joi.string().valid('succeeded', 'failed').required(),
    audioBase64: Joi.string().base64().optional(),
    audioUrl: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
    error: Joi.string().max(2000).optional(),
  }).when(Joi.object({ status: Joi.valid('succeeded') }).unknown(), {
    then: Joi.object().xor('audioBase64', 'audioUrl'),
  }),
};
