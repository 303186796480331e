/**
 * Screen and camera detection routes
 */

import { Hono } from 'hono';
import type { AudioPayload, CameraDetectionResponse, ScreenDetectionResponse } from '@pika/shared';
import { messageOf } from '../errors.js';
import { warningMessage } from '../prompts.js';
import type { SpeechService } from '../services/speech.js';
import type { AssistantDeps } from '../types.js';
import { errorBody, readJsonObject, stringField } from './request.js';

interface Warning {
  audio?: AudioPayload;
  warning_message?: string;
}

/**
 * Spoken warning for a non-study activity. Empty when audio is disabled or synthesis fails.
 */
async function warn(speech: SpeechService, isStudying: boolean, activity: string): Promise<Warning> {
  if (isStudying || !activity || !speech.enabled) return {};

  const message = warningMessage(activity);
  const audio = await speech.synthesize(message, 'warning');
  return audio ? { audio, warning_message: message } : {};
}

export function createDetectRoutes({ vision, speech }: AssistantDeps) {
  const detect = new Hono();

  // POST /detectscreen
  detect.post('/detectscreen', async (c) => {
    const body = await readJsonObject(c);
    if (!body) {
      return c.json(errorBody('No JSON data provided'), 400);
    }
    const image = stringField(body, 'image');
    if (!image) {
      return c.json(errorBody('Image field is required and cannot be empty'), 400);
    }

    try {
      const analysis = await vision.analyzeScreen(image);
      const result: ScreenDetectionResponse = {
        text_extracted: analysis.textExtracted,
        activity_detected: analysis.activity,
        is_studying: analysis.isStudying,
        analysis: analysis.analysis,
        ocr_model_used: analysis.ocrModelUsed,
        vision_model_used: analysis.visionModelUsed,
        status: 'success',
      };
      if (analysis.details) result.details = analysis.details;

      return c.json({ ...result, ...(await warn(speech, analysis.isStudying, analysis.activity)) });
    } catch (error) {
      return c.json(errorBody(`Error processing screen detection: ${messageOf(error)}`), 500);
    }
  });

  // POST /detectcamera
  detect.post('/detectcamera', async (c) => {
    const body = await readJsonObject(c);
    if (!body) {
      return c.json(errorBody('No JSON data provided'), 400);
    }
    const image = stringField(body, 'image');
    if (!image) {
      return c.json(errorBody('Image field is required and cannot be empty'), 400);
    }

    try {
      const analysis = await vision.analyzeCamera(image);
      const result: CameraDetectionResponse = {
        person_present: analysis.personPresent,
        activity_detected: analysis.activity,
        is_studying: analysis.isStudying,
        analysis: analysis.analysis,
        vision_model_used: analysis.visionModelUsed,
        status: 'success',
      };
      if (analysis.details) result.details = analysis.details;

      return c.json({ ...result, ...(await warn(speech, analysis.isStudying, analysis.activity)) });
    } catch (error) {
      return c.json(errorBody(`Error processing camera detection: ${messageOf(error)}`), 500);
    }
  });

  return detect;
}
