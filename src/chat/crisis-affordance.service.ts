import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MoodTag } from '../mood/mood-tag';
import { ExerciseKind } from '../exercise/exercise-steps';

export enum CrisisLevel {
  NONE = 'none',
  LOW = 'low',        // Sadness, wish for company
  MEDIUM = 'medium',  // Anxiety that a breathing exercise can help with
  CRITICAL = 'critical' // Acute distress
}

export type AffordanceMode = 'none' | 'offer' | 'force';

export interface EmergencyResource {
  name: string;
  contact: string;
  description: string;
  available: string;
}

export interface CrisisAffordance {
  level: CrisisLevel;
  mode: AffordanceMode;
  exercise: ExerciseKind | null;
  emergencyResources: EmergencyResource[];
}

interface AffordanceRule {
  level: CrisisLevel;
  mode: AffordanceMode;
  exercise: ExerciseKind | null;
}

const AFFORDANCE_RULES: Record<MoodTag, AffordanceRule> = {
  [MoodTag.SERIOUS_DISTRESS]: { level: CrisisLevel.CRITICAL, mode: 'force', exercise: 'panic' },
  [MoodTag.ANXIOUS]: { level: CrisisLevel.MEDIUM, mode: 'offer', exercise: 'panic' },
  [MoodTag.SAD]: { level: CrisisLevel.LOW, mode: 'offer', exercise: 'grounding' },
  [MoodTag.SEEKING_COMMUNITY]: { level: CrisisLevel.LOW, mode: 'none', exercise: null },
  [MoodTag.HAPPY]: { level: CrisisLevel.NONE, mode: 'none', exercise: null },
  [MoodTag.NEUTRAL]: { level: CrisisLevel.NONE, mode: 'none', exercise: null },
};

const US_RESOURCES: EmergencyResource[] = [
  {
    name: '988 Suicide & Crisis Lifeline',
    contact: 'Call or text 988',
    description: '24/7 free and confidential support for people in distress',
    available: '24/7',
  },
  {
    name: 'Crisis Text Line',
    contact: 'Text HOME to 741741',
    description: 'Free 24/7 text support with a trained crisis counselor',
    available: '24/7',
  },
  {
    name: 'Emergency Services',
    contact: 'Call 911',
    description: 'For immediate life-threatening emergencies',
    available: '24/7',
  },
];

const UK_RESOURCES: EmergencyResource[] = [
  {
    name: 'Samaritans',
    contact: 'Call 116 123',
    description: 'Free, confidential support for anyone who is struggling',
    available: '24/7',
  },
  {
    name: 'Shout',
    contact: 'Text SHOUT to 85258',
    description: 'Free text support for anyone in crisis',
    available: '24/7',
  },
  {
    name: 'Emergency Services',
    contact: 'Call 999',
    description: 'For immediate life-threatening emergencies',
    available: '24/7',
  },
];

/**
 * Decides, from the turn's mood tag alone, whether the client should offer a
 * calming exercise or start one immediately.
 */
@Injectable()
export class CrisisAffordanceService {
  private readonly logger = new Logger(CrisisAffordanceService.name);

  constructor(private configService: ConfigService) {}

  evaluate(mood: MoodTag): CrisisAffordance {
    const rule = AFFORDANCE_RULES[mood];

    if (rule.level === CrisisLevel.CRITICAL) {
      this.logger.warn(`CRISIS AFFORDANCE - mood: ${mood}, exercise: ${rule.exercise}`);
    }

    return {
      ...rule,
      emergencyResources: rule.level === CrisisLevel.CRITICAL ? this.getEmergencyResources() : [],
    };
  }

  /**
   * Get emergency resources based on configuration
   */
  getEmergencyResources(): EmergencyResource[] {
    const country = this.configService.get<string>('EMERGENCY_COUNTRY', 'US').toUpperCase();
    const resources = country === 'UK' || country === 'GB' ? UK_RESOURCES : US_RESOURCES;
    return resources.map((resource) => ({ ...resource }));
  }
}
