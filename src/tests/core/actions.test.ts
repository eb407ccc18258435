import { describe, it, expect } from 'vitest';
import { actionData, parseAction } from '../../core/domain/actions';

describe('parseAction', () => {
  it('decodes the private-chat buttons', () => {
    expect(parseAction('start_introduction')).toEqual({ type: 'start_introduction' });
    expect(parseAction('confirm_residence')).toEqual({ type: 'confirm_residence' });
    expect(parseAction('not_residing')).toEqual({ type: 'not_residing' });
  });

  it('decodes decision buttons carrying a user id', () => {
    expect(parseAction('allow:42')).toEqual({ type: 'allow', userId: 42 });
    expect(parseAction('deny:42')).toEqual({ type: 'deny', userId: 42 });
    expect(parseAction('request_photo:42')).toEqual({ type: 'request_photo', userId: 42 });
  });

  it('keeps the sign of negative group chat ids', () => {
    expect(parseAction('pick_house:42:-1001')).toEqual({ type: 'pick_house', userId: 42, chatId: -1001 });
  });

  it('rejects unknown or malformed payloads', () => {
    expect(parseAction('allow')).toBeNull();
    expect(parseAction('allow:abc')).toBeNull();
    expect(parseAction('pick_house:42')).toBeNull();
    expect(parseAction('confirm_residence:1')).toBeNull();
    expect(parseAction('menu:settings')).toBeNull();
  });

  it('reads back what the builders produce', () => {
    expect(parseAction(actionData.pickHouse(7, -200))).toEqual({ type: 'pick_house', userId: 7, chatId: -200 });
    expect(parseAction(actionData.requestPhoto(7))).toEqual({ type: 'request_photo', userId: 7 });
  });
});
