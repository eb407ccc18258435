import { z } from 'zod';

// Limits applied to questionnaire answers
// .int() requires integer, .positive() requires > 0
const QuestionnaireSchema = z.object({
  nameMaxLength: z.number().int().positive().default(50),
  bannedWords: z.array(z.string().min(1)).default([]),
  apartment: z
    .object({
      min: z.number().int(),
      max: z.number().int(),
    })
    .refine((range) => range.min <= range.max, { message: 'apartment.min must not exceed apartment.max' }),
  vehicles: z.object({
    max: z.number().int().nonnegative(),
  }),
  plate: z
    .object({
      minLength: z.number().int().positive(),
      maxLength: z.number().int().positive(),
    })
    .refine((range) => range.minLength <= range.maxLength, {
      message: 'plate.minLength must not exceed plate.maxLength',
    }),
});

// Messages sent to the resident in the private chat
const UserTemplatesSchema = z.object({
  welcome_private: z.string(),
  intro_button: z.string(),
  confirm_prompt: z.string(),
  confirm_button: z.string(),
  decline_button: z.string(),
  not_residing: z.string(),
  already_registered: z.string(),
  questionnaire_intro: z.string(),
  ask_name: z.string(),
  ask_surname: z.string(),
  ask_apartment: z.string(),
  ask_phone: z.string(),
  ask_vehicle_count: z.string(),
  ask_plate: z.string(),
  name_too_long: z.string(),
  name_banned: z.string(),
  surname_too_long: z.string(),
  surname_banned: z.string(),
  invalid_apartment: z.string(),
  invalid_phone: z.string(),
  invalid_vehicle_count: z.string(),
  invalid_plate: z.string(),
  no_vehicles: z.string(),
  questionnaire_done: z.string(),
  photo_received: z.string(),
  photo_reminder: z.string(),
  awaiting_clarification: z.string(),
  house_assigned: z.string(),
  approved: z.string(),
  denied: z.string(),
  new_photo_requested: z.string(),
  save_error: z.string(),
  unknown_input: z.string(),
});

// Messages posted into the house group chat
const HouseTemplatesSchema = z.object({
  welcome_member: z.string(),
  member_approved: z.string(),
  member_denied: z.string(),
  member_needs_clarification: z.string(),
  member_declined: z.string(),
});

// Messages and button captions for the administrator
const AdminTemplatesSchema = z.object({
  photo_card: z.string(),
  approve_button: z.string(),
  deny_button: z.string(),
  request_photo_button: z.string(),
  approved_ack: z.string(),
  denied_ack: z.string(),
  ask_reason: z.string(),
  reason_saved: z.string(),
  no_pending_reason: z.string(),
  choose_house: z.string(),
  assign_house: z.string(),
  no_houses: z.string(),
  house_chosen_ack: z.string(),
  no_access: z.string(),
  check_usage: z.string(),
  unknown_house: z.string(),
  report_empty: z.string(),
});

// Complete policy configuration schema
// messageLimit caps a single outgoing message (Telegram allows 4096 characters)
export const PolicySchema = z.object({
  questionnaire: QuestionnaireSchema,
  messageLimit: z.number().int().positive().max(4096).default(4096),
  templates: z.object({
    user: UserTemplatesSchema,
    house: HouseTemplatesSchema,
    admin: AdminTemplatesSchema,
  }),
});

// z.infer<typeof Schema> extracts TypeScript type from Zod schema
export type PolicyConfig = z.infer<typeof PolicySchema>;
