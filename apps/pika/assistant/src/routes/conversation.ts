/**
 * Conversation routes: welcome, chat, voice and reset
 */

import { Hono } from 'hono';
import { stripDataUrl, type ChatResponse, type ResetResponse, type VoiceResponse, type WelcomeResponse } from '@pika/shared';
import { messageOf } from '../errors.js';
import { detectTimerRequest } from '../services/timer-intent.js';
import type { AssistantDeps } from '../types.js';
import { errorBody, readJsonObject, stringField } from './request.js';

export function createConversationRoutes({ assistant, speech }: AssistantDeps) {
  const conversation = new Hono();

  const respond = async (message: string): Promise<ChatResponse> => {
    if (!assistant.isActive) {
      await assistant.start();
    }

    const reply = await assistant.processUserInput(message);
    if (reply.error !== undefined) {
      throw new Error(reply.error);
    }
    const duration = detectTimerRequest(message);
    const audio = await speech.synthesize(reply.content);

    const result: ChatResponse = { response: reply.content, status: 'success' };
    if (audio) result.audio = audio;
    if (duration) result.time = duration.formatted;
    if (reply.timerId) result.timer_id = reply.timerId;
    return result;
  };

  // GET /welcome
  conversation.get('/welcome', async (c) => {
    const message = assistant.isActive ? await assistant.generateWelcome() : await assistant.start();
    const audio = await speech.welcomeAudio(message);

    const result: WelcomeResponse = { message, status: 'success' };
    if (audio) result.audio = audio;
    return c.json(result);
  });

  // POST /chat
  conversation.post('/chat', async (c) => {
    const body = await readJsonObject(c);
    if (!body) {
      return c.json(errorBody('No JSON data provided'), 400);
    }

    const message = stringField(body, 'message');
    if (!message) {
      return c.json(errorBody('Message field is required and cannot be empty'), 400);
    }

    try {
      return c.json(await respond(message));
    } catch (error) {
      return c.json(errorBody(`Error processing request: ${messageOf(error)}`), 500);
    }
  });

  // POST /voice
  conversation.post('/voice', async (c) => {
    const body = await readJsonObject(c);
    if (!body) {
      return c.json(errorBody('No JSON data provided'), 400);
    }

    const audio = stripDataUrl(stringField(body, 'audio'));
    if (!audio.base64) {
      return c.json(errorBody('Audio field is required and cannot be empty'), 400);
    }
    const format = stringField(body, 'format') || audio.mimeType || 'audio/webm';

    if (!speech.enabled) {
      return c.json(
        errorBody('ElevenLabs client not initialized. Speech-to-text requires ElevenLabs API key.'),
        500
      );
    }

    let transcription: string;
    try {
      transcription = (await speech.transcribe(audio.base64, format)).trim();
    } catch (error) {
      return c.json(errorBody(`Failed to transcribe audio: ${messageOf(error)}`), 500);
    }
    if (!transcription) {
      return c.json(errorBody('Transcription resulted in empty text'), 400);
    }

    try {
      const result: VoiceResponse = { ...(await respond(transcription)), transcription };
      return c.json(result);
    } catch (error) {
      return c.json(errorBody(`Error processing voice input: ${messageOf(error)}`), 500);
    }
  });

  // POST /reset
  conversation.post('/reset', async (c) => {
    await assistant.reset();
    speech.clearWelcomeCache();

    const result: ResetResponse = { message: 'Conversation reset successfully', status: 'success' };
    return c.json(result);
  });

  return conversation;
}
