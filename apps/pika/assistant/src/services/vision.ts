import { createLogger, type Logger } from '@pika/shared';
import { CAMERA_PROMPT, OCR_PROMPT, activityPrompt } from '../prompts.js';
import type { LLMClient } from './openrouter-client.js';

export interface ScreenActivity {
  activity: string;
  isStudying: boolean;
  details: string;
}

export interface CameraActivity extends ScreenActivity {
  personPresent: boolean;
}

export interface ScreenAnalysis extends ScreenActivity {
  textExtracted: string;
  analysis: string;
  ocrModelUsed: string;
  visionModelUsed: string;
}

export interface CameraAnalysis extends CameraActivity {
  analysis: string;
  visionModelUsed: string;
}

const UNPARSED = 'Unable to parse activity';
const NO_PERSON = 'No person detected in camera';

const NON_STUDY_KEYWORDS = ['reddit', 'twitter', 'facebook', 'instagram', 'messaging', 'texting', 'game', 'video', 'entertainment', 'social media'];
const STUDY_KEYWORDS = ['study', 'reading', 'coding', 'writing', 'research', 'document', 'textbook', 'learning'];
const ABSENT_KEYWORDS = ['no person', 'absent', 'not visible', 'empty', 'no one'];
const PRESENT_KEYWORDS = ['person', 'visible', 'present', 'seen'];
const DISTRACTION_KEYWORDS = ['phone', 'mobile', 'tablet', 'device', 'looking away', 'distracted', 'eating', 'drinking', 'sleeping'];

type Section = 'presence' | 'activity' | 'studying' | 'details';

interface Sections {
  personPresent?: boolean;
  isStudying?: boolean;
  activity: string;
  details: string;
}

const affirmative = (value: string): boolean => {
  const lower = value.toLowerCase();
  return lower.includes('yes') || lower.includes('true');
};

const hasAny = (text: string, keywords: string[]): boolean => keywords.some((k) => text.includes(k));

/**
 * Reads `PERSON_PRESENT:`, `ACTIVITY:`, `IS_STUDYING:` and `DETAILS:` lines.
 * Unlabelled lines continue the current activity or details section.
 */
function readSections(text: string): Sections {
  const sections: Sections = { activity: '', details: '' };
  let current: Section | undefined;

  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line.startsWith('PERSON_PRESENT:')) {
      sections.personPresent = affirmative(line.slice('PERSON_PRESENT:'.length));
      current = 'presence';
    } else if (line.startsWith('ACTIVITY:')) {
      sections.activity = line.slice('ACTIVITY:'.length).trim();
      current = 'activity';
    } else if (line.startsWith('IS_STUDYING:')) {
      sections.isStudying = affirmative(line.slice('IS_STUDYING:'.length));
      current = 'studying';
    } else if (line.startsWith('DETAILS:')) {
      sections.details = line.slice('DETAILS:'.length).trim();
      current = 'details';
    } else if (line && current === 'activity') {
      sections.activity += ` ${line}`;
    } else if (line && current === 'details') {
      sections.details += ` ${line}`;
    }
  }

  return sections;
}

export function parseScreenAnalysis(text: string): ScreenActivity {
  const sections = readSections(text);
  let activity = sections.activity;
  let isStudying = sections.isStudying ?? true;

  if (!activity) {
    activity = UNPARSED;
    const lower = text.toLowerCase();
    if (hasAny(lower, NON_STUDY_KEYWORDS)) {
      isStudying = false;
      activity = 'Non-study activity detected';
    } else if (hasAny(lower, STUDY_KEYWORDS)) {
      isStudying = true;
      activity = 'Study activity detected';
    }
  }

  return { activity, isStudying, details: sections.details };
}

export function parseCameraAnalysis(text: string): CameraActivity {
  const sections = readSections(text);
  let activity = sections.activity;
  let personPresent = sections.personPresent ?? false;
  let isStudying = sections.isStudying ?? false;

  if (!activity) {
    activity = UNPARSED;
    const lower = text.toLowerCase();
    if (hasAny(lower, ABSENT_KEYWORDS)) {
      personPresent = false;
      isStudying = false;
      activity = NO_PERSON;
    } else if (hasAny(lower, PRESENT_KEYWORDS)) {
      personPresent = true;
      isStudying = !hasAny(lower, DISTRACTION_KEYWORDS);
      activity = isStudying ? 'Person present and studying' : 'Person present but distracted';
    }
  }

  if (!personPresent) {
    isStudying = false;
    if (activity === UNPARSED) activity = NO_PERSON;
  }

  return { personPresent, activity, isStudying, details: sections.details };
}

export interface VisionAnalyzerOptions {
  llm: LLMClient;
  ocrModel: string;
  visionModel: string;
  logger?: Logger;
}

/**
 * Screen and camera analysis on top of the provider's image endpoint.
 */
export class VisionAnalyzer {
  private llm: LLMClient;
  private ocrModel: string;
  private visionModel: string;
  private logger: Logger;

  constructor(options: VisionAnalyzerOptions) {
    this.llm = options.llm;
    this.ocrModel = options.ocrModel;
    this.visionModel = options.visionModel;
    this.logger = options.logger ?? createLogger('Vision');
  }

  /**
   * Two calls: text extraction first (no backups), then activity analysis
   * with the extracted text in the prompt.
   */
  async analyzeScreen(image: string): Promise<ScreenAnalysis> {
    this.logger.info(`Extracting text using OCR model: ${this.ocrModel}`);
    const ocr = await this.llm.analyzeImage(image, OCR_PROMPT, {
      model: this.ocrModel,
      temperature: 0.1,
      maxTokens: 2000,
      useBackup: false,
    });
    const textExtracted = ocr.content.trim();

    this.logger.info(`Analyzing activity using vision model: ${this.visionModel}`);
    const result = await this.llm.analyzeImage(image, activityPrompt(textExtracted), {
      model: this.visionModel,
      temperature: 0.3,
      maxTokens: 1000,
    });

    return {
      ...parseScreenAnalysis(result.content),
      textExtracted,
      analysis: result.content,
      ocrModelUsed: ocr.modelUsed,
      visionModelUsed: result.modelUsed,
    };
  }

  async analyzeCamera(image: string): Promise<CameraAnalysis> {
    this.logger.info(`Analyzing camera image using vision model: ${this.visionModel}`);
    const result = await this.llm.analyzeImage(image, CAMERA_PROMPT, {
      model: this.visionModel,
      temperature: 0.3,
      maxTokens: 1000,
    });

    return {
      ...parseCameraAnalysis(result.content),
      analysis: result.content,
      visionModelUsed: result.modelUsed,
    };
  }
}
