/**
 * Consolidated port interfaces for the residents gatekeeper.
 * Organized into logical groupings: domain records, sessions, configuration,
 * chat transport, persistence and logging.
 */

// ==================== Domain Types ====================

export interface House {
  id: number;
  chatId: number;
  name: string | null;
  city: string | null;
  address: string | null;
  dateAdd: Date | null;
  dateDel: Date | null;
}

export interface Resident {
  id: number;
  tgId: number;
  name: string | null;
  surname: string | null;
  houseId: number | null;
  apartment: string | null;
  phone: string | null;
  dateAdd: Date | null;
  dateDel: Date | null;
}

export interface Vehicle {
  id: number;
  residentId: number;
  plate: string;
  dateAdd: Date | null;
  dateDel: Date | null;
}

// Fields the questionnaire writes onto a resident row
export type ResidentFields = Partial<Pick<Resident, 'name' | 'surname' | 'apartment' | 'phone'>>;

export interface HouseDetails {
  name?: string;
}

// ==================== Candidate Sessions ====================

// Which question the private conversation is waiting on
export type QuestionnaireStep =
  | { kind: 'name' }
  | { kind: 'surname' }
  | { kind: 'apartment' }
  | { kind: 'phone' }
  | { kind: 'vehicle_count' }
  | { kind: 'vehicle_plate'; index: number; total: number };

// Operation suspended until the administrator picks a house
export type PendingAction = 'register' | 'approve' | 'deny';

export type SessionState =
  | { status: 'awaiting_confirm'; step?: QuestionnaireStep }
  | { status: 'awaiting_photo' }
  | { status: 'photo_sent' }
  | { status: 'awaiting_new_photo'; reason: string }
  | { status: 'approved' }
  | { status: 'denied' };

export interface SessionBase {
  userId: number;
  joinedAt: Date;
  houseChatId?: number;
  pendingAction?: PendingAction;
}

export type CandidateSession = SessionBase & SessionState;

// ==================== Configuration ====================

export interface QuestionnaireRules {
  nameMaxLength: number;
  bannedWords: string[];
  apartment: { min: number; max: number };
  vehicles: { max: number };
  plate: { minLength: number; maxLength: number };
}

export interface MessageTemplates {
  user: Record<UserTemplate, string>;
  house: Record<HouseTemplate, string>;
  admin: Record<AdminTemplate, string>;
}

export type UserTemplate =
  | 'welcome_private'
  | 'intro_button'
  | 'confirm_prompt'
  | 'confirm_button'
  | 'decline_button'
  | 'not_residing'
  | 'already_registered'
  | 'questionnaire_intro'
  | 'ask_name'
  | 'ask_surname'
  | 'ask_apartment'
  | 'ask_phone'
  | 'ask_vehicle_count'
  | 'ask_plate'
  | 'name_too_long'
  | 'name_banned'
  | 'surname_too_long'
  | 'surname_banned'
  | 'invalid_apartment'
  | 'invalid_phone'
  | 'invalid_vehicle_count'
  | 'invalid_plate'
  | 'no_vehicles'
  | 'questionnaire_done'
  | 'photo_received'
  | 'photo_reminder'
  | 'awaiting_clarification'
  | 'house_assigned'
  | 'approved'
  | 'denied'
  | 'new_photo_requested'
  | 'save_error'
  | 'unknown_input';

export type HouseTemplate =
  | 'welcome_member'
  | 'member_approved'
  | 'member_denied'
  | 'member_needs_clarification'
  | 'member_declined';

export type AdminTemplate =
  | 'photo_card'
  | 'approve_button'
  | 'deny_button'
  | 'request_photo_button'
  | 'approved_ack'
  | 'denied_ack'
  | 'ask_reason'
  | 'reason_saved'
  | 'no_pending_reason'
  | 'choose_house'
  | 'assign_house'
  | 'no_houses'
  | 'house_chosen_ack'
  | 'no_access'
  | 'check_usage'
  | 'unknown_house'
  | 'report_empty';

/**
 * Synchronous configuration service.
 * Loaded at startup from the environment and policy.json.
 */
export interface Config {
  adminId(): number;
  botName(): string;
  questionnaire(): QuestionnaireRules;
  messageLimit(): number;
  messaging(): MessageTemplates;
}

// ==================== Chat Transport ====================

export interface KeyboardButton {
  text: string;
  data: string;
}

// Rows of inline buttons
export type Keyboard = KeyboardButton[][];

export type MemberStatus = 'creator' | 'administrator' | 'member' | 'restricted' | 'left' | 'kicked';

export interface MemberInfo {
  status: MemberStatus;
  firstName: string;
  username?: string;
}

export interface ChatInfo {
  title?: string;
  username?: string;
}

/**
 * Outbound side of the chat platform that the workflows depend on.
 */
export interface ChatTransport {
  sendMessage(chatId: number, text: string, keyboard?: Keyboard): Promise<void>;
  sendPhoto(chatId: number, fileRef: string, caption?: string, keyboard?: Keyboard): Promise<void>;
  restrictPosting(chatId: number, userId: number, allowed: boolean): Promise<void>;
  // Kick followed by unban so the user may rejoin later
  removeMember(chatId: number, userId: number): Promise<void>;
  getMember(chatId: number, userId: number): Promise<MemberInfo>;
  getChatInfo(chatId: number): Promise<ChatInfo>;
}

// ==================== Data Repositories ====================

export interface StoreDump {
  houses: House[];
  residents: Resident[];
  vehicles: Vehicle[];
}

/**
 * Durable houses / residents / vehicles with soft-delete.
 * Owns the vehicle cascade on deactivation.
 */
export interface ResidencyStore {
  findHouse(chatId: number): Promise<House | null>;
  createHouse(chatId: number, details?: HouseDetails): Promise<House>;
  listHouses(activeOnly: boolean): Promise<House[]>;

  findResident(tgId: number, houseId: number | null): Promise<Resident | null>;
  findResidents(tgId: number): Promise<Resident[]>;
  listHousesForUser(tgId: number): Promise<House[]>;
  upsertResident(tgId: number, houseId: number | null, fields: ResidentFields): Promise<Resident>;
  deactivateResident(tgId: number, houseId: number): Promise<Resident | null>;
  reactivateResident(tgId: number, houseId: number): Promise<Resident | null>;
  countActiveResidencies(tgId: number): Promise<number>;
  listByHouse(houseId: number, activeOnly: boolean): Promise<Resident[]>;

  addVehicle(residentId: number, plate: string): Promise<Vehicle>;
  listVehicles(residentId: number, activeOnly: boolean): Promise<Vehicle[]>;
  reactivateVehicles(residentId: number): Promise<number>;
  deactivateAllVehicles(tgId: number): Promise<number>;

  dump(): Promise<StoreDump>;
}

// ==================== Logging ====================

/**
 * Logger abstraction for infrastructure-independent logging.
 */
export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}
