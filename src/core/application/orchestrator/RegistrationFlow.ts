import type {
  Config,
  Logger,
  QuestionnaireStep,
  ResidencyStore,
  ResidentFields,
  UserTemplate,
} from '../../ports';
import {
  validateApartment,
  validatePersonName,
  validatePhone,
  validatePlate,
  validateVehicleCount,
  type ValidationError,
} from '../../domain/validation';
import type { CandidateSessionStore } from '../sessions/CandidateSessionStore';
import type { Notifier } from '../Notifier';

type Reply = { key: UserTemplate; data?: Record<string, unknown> };

/**
 * Private-chat questionnaire. Each answer is validated and written to the
 * resident row straight away; an invalid answer repeats the same question.
 */
export class RegistrationFlow {
  constructor(
    private readonly store: ResidencyStore,
    private readonly sessions: CandidateSessionStore,
    private readonly notifier: Notifier,
    private readonly config: Config,
    private readonly logger: Logger,
  ) {}

  async begin(userId: number): Promise<void> {
    this.sessions.transition(userId, { status: 'awaiting_confirm', step: { kind: 'name' } });
    await this.notifier.user(userId, 'questionnaire_intro');
    await this.ask(userId, { kind: 'name' });
  }

  // Dispatch a text message to whatever question the session is on
  async handleAnswer(userId: number, text: string): Promise<void> {
    const session = this.sessions.get(userId);
    if (!session || session.status !== 'awaiting_confirm' || !session.step) {
      return;
    }

    if (session.houseChatId === undefined) {
      this.logger.warn({ userId }, 'Questionnaire answer without a house');
      await this.notifier.user(userId, 'awaiting_clarification');
      return;
    }

    try {
      await this.apply(userId, session.houseChatId, session.step, text);
    } catch (err) {
      this.logger.error({ err, userId, step: session.step.kind }, 'Failed to save questionnaire answer');
      await this.notifier.user(userId, 'save_error');
    }
  }

  private async apply(userId: number, chatId: number, step: QuestionnaireStep, text: string): Promise<void> {
    const rules = this.config.questionnaire();

    switch (step.kind) {
      case 'name':
      case 'surname': {
        const result = validatePersonName(text, rules);
        if (!result.valid) {
          return this.reject(userId, step, nameError(step.kind, result.error, rules.nameMaxLength));
        }
        const fields: ResidentFields = step.kind === 'name' ? { name: result.value } : { surname: result.value };
        await this.save(userId, chatId, fields);
        return this.advance(userId, step.kind === 'name' ? { kind: 'surname' } : { kind: 'apartment' });
      }

      case 'apartment': {
        const result = validateApartment(text, rules);
        if (!result.valid) {
          return this.reject(userId, step, {
            key: 'invalid_apartment',
            data: { min: rules.apartment.min, max: rules.apartment.max },
          });
        }
        await this.save(userId, chatId, { apartment: result.value });
        return this.advance(userId, { kind: 'phone' });
      }

      case 'phone': {
        const result = validatePhone(text);
        if (!result.valid) {
          return this.reject(userId, step, { key: 'invalid_phone' });
        }
        await this.save(userId, chatId, { phone: result.value });
        return this.advance(userId, { kind: 'vehicle_count' });
      }

      case 'vehicle_count': {
        const result = validateVehicleCount(text, rules);
        if (!result.valid) {
          return this.reject(userId, step, { key: 'invalid_vehicle_count', data: { max: rules.vehicles.max } });
        }
        if (result.value === 0) {
          await this.notifier.user(userId, 'no_vehicles');
          return this.finalize(userId);
        }
        return this.advance(userId, { kind: 'vehicle_plate', index: 1, total: result.value });
      }

      case 'vehicle_plate': {
        const result = validatePlate(text, rules);
        if (!result.valid) {
          return this.reject(userId, step, {
            key: 'invalid_plate',
            data: { min: rules.plate.minLength, max: rules.plate.maxLength },
          });
        }

        const house = await this.store.createHouse(chatId);
        const resident = await this.store.findResident(userId, house.id);
        if (!resident) {
          throw new Error(`Resident ${userId} missing in house ${chatId}`);
        }
        await this.store.addVehicle(resident.id, result.value);

        if (step.index < step.total) {
          return this.advance(userId, { kind: 'vehicle_plate', index: step.index + 1, total: step.total });
        }
        return this.finalize(userId);
      }
    }
  }

  // House row is created on the first write if the chat is unknown
  private async save(userId: number, chatId: number, fields: ResidentFields): Promise<void> {
    const house = await this.store.createHouse(chatId);
    await this.store.upsertResident(userId, house.id, fields);
  }

  private async advance(userId: number, step: QuestionnaireStep): Promise<void> {
    this.sessions.transition(userId, { status: 'awaiting_confirm', step });
    await this.ask(userId, step);
  }

  private async reject(userId: number, step: QuestionnaireStep, reply: Reply): Promise<void> {
    await this.notifier.user(userId, reply.key, reply.data);
    await this.ask(userId, step);
  }

  private async finalize(userId: number): Promise<void> {
    this.sessions.transition(userId, { status: 'awaiting_photo' });
    await this.notifier.user(userId, 'questionnaire_done');
    this.logger.info({ userId }, 'Questionnaire completed');
  }

  private async ask(userId: number, step: QuestionnaireStep): Promise<void> {
    if (step.kind === 'vehicle_plate') {
      await this.notifier.user(userId, 'ask_plate', { index: step.index });
      return;
    }
    await this.notifier.user(userId, QUESTIONS[step.kind]);
  }
}

const QUESTIONS: Record<Exclude<QuestionnaireStep['kind'], 'vehicle_plate'>, UserTemplate> = {
  name: 'ask_name',
  surname: 'ask_surname',
  apartment: 'ask_apartment',
  phone: 'ask_phone',
  vehicle_count: 'ask_vehicle_count',
};

const nameError = (field: 'name' | 'surname', error: ValidationError, max: number): Reply => {
  if (error === 'too_long') {
    return { key: field === 'name' ? 'name_too_long' : 'surname_too_long', data: { max } };
  }
  return { key: field === 'name' ? 'name_banned' : 'surname_banned' };
};
