// Shared types between the gateway, the assistant and the frontend

export * from './logger.js'
export * from './data-url.js'

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export const INPUT_TYPES = ['screen', 'camera', 'video', 'text', 'voice'] as const

export type InputType = (typeof INPUT_TYPES)[number]

export interface AudioPayload {
  data: string
  format: string
  mime_type: string
  data_url: string
}

export interface ErrorResponse {
  error: string
  status: 'error'
}

// Assistant API response types

export interface ChatResponse {
  response: string
  status: 'success'
  audio?: AudioPayload
  time?: string // HH:MM:SS duration detected in the user message
  timer_id?: string
}

export interface VoiceResponse extends ChatResponse {
  transcription: string
}

export interface WelcomeResponse {
  message: string
  status: 'success'
  audio?: AudioPayload
}

export interface ResetResponse {
  message: string
  status: 'success'
}

export interface ScreenDetectionResponse {
  text_extracted: string
  activity_detected: string
  is_studying: boolean
  analysis: string
  ocr_model_used: string
  vision_model_used: string
  status: 'success'
  details?: string
  audio?: AudioPayload
  warning_message?: string
}

export interface CameraDetectionResponse {
  person_present: boolean
  activity_detected: string
  is_studying: boolean
  analysis: string
  vision_model_used: string
  status: 'success'
  details?: string
  audio?: AudioPayload
  warning_message?: string
}

export interface TimerSummary {
  id: string
  seconds: number
  time: string
  started_at: string
  fires_at: string
}

export interface TimersResponse {
  timers: TimerSummary[]
  status: 'success'
}

export interface StatusResponse {
  is_active: boolean
  model: string
  backup_models: string[]
  audio_enabled: boolean
  active_timers: number
  status: 'success'
}

export interface HealthResponse {
  status: 'healthy'
  service: string
}

// Gateway response types

export type GatewayResponse =
  | ({ success: true; input_type: InputType; saved_path?: string } & Record<string, unknown>)
  | { success: false; input_type?: InputType; saved_path?: string; error: string }

export interface PredictResponse {
  success: true
  prediction: number | string
}
