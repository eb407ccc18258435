import type { Config, MessageTemplates, QuestionnaireRules } from '../../core/ports';
import type { PolicyConfig } from '../config/policySchema';

export interface BotIdentity {
  adminId: number;
  botName: string;
}

// Synchronous configuration service implementing Config port interface
// Policy comes from policy.json, identity from the environment; neither changes at runtime
export class ConfigImpl implements Config {
  constructor(
    private readonly policy: PolicyConfig,
    private readonly identity: BotIdentity,
  ) {}

  // Telegram user id of the only administrator allowed to decide requests
  adminId(): number {
    return this.identity.adminId;
  }

  // Public @handle without the @, used for t.me deep links
  botName(): string {
    return this.identity.botName;
  }

  questionnaire(): QuestionnaireRules {
    const rules = this.policy.questionnaire;
    return {
      nameMaxLength: rules.nameMaxLength,
      // Matching is case-insensitive, so store the blocklist lowercased once
      bannedWords: rules.bannedWords.map((word) => word.toLowerCase()),
      apartment: { min: rules.apartment.min, max: rules.apartment.max },
      vehicles: { max: rules.vehicles.max },
      plate: { minLength: rules.plate.minLength, maxLength: rules.plate.maxLength },
    };
  }

  messageLimit(): number {
    return this.policy.messageLimit;
  }

  messaging(): MessageTemplates {
    return {
      user: this.policy.templates.user,
      house: this.policy.templates.house,
      admin: this.policy.templates.admin,
    };
  }
}
