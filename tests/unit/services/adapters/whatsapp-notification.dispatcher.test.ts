import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, it, expect, vi } from 'vitest';

import {
  WhatsAppNotificationDispatcher,
  splitMessage,
} from '../../../../src/services/adapters/whatsapp-notification.dispatcher.js';
import { buildEmployee, buildRequest } from '../../../helpers/leave-fixtures.js';

const KEY = 'leave:req-1:notify_employee:v3';

/**
 * Stands in for the Twilio API: answers with sequential message sids, or
 * rejects every request with `status`
 */
function twilioAdapter(status = 201) {
  let sequence = 0;
  return vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    if (status !== 201) {
      const response: AxiosResponse = {
        data: { message: 'invalid To number' },
        status,
        statusText: 'Bad Request',
        headers: {},
        config,
      };
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }
    sequence++;
    return { data: { sid: `SM${sequence}` }, status, statusText: 'Created', headers: {}, config };
  });
}

function dispatcherWith(adapter: ReturnType<typeof twilioAdapter>): WhatsAppNotificationDispatcher {
  const config = {
    accountSid: 'AC123',
    authToken: 'test-secret',
    fromNumber: '+15550009999',
    baseUrl: 'https://twilio.test/2010-04-01',
  };
  return new WhatsAppNotificationDispatcher(config, {
    timeoutMs: 5000,
    http: axios.create({ baseURL: config.baseUrl, timeout: 5000, adapter }),
  });
}

describe('splitMessage', () => {
  it('should keep short messages whole', () => {
    expect(splitMessage('hello there', 20)).toEqual(['hello there']);
  });

  it('should prefer line breaks, then spaces', () => {
    expect(splitMessage('first line\nsecond line', 12)).toEqual(['first line', 'second line']);
    expect(splitMessage('aaa bbb ccc', 7)).toEqual(['aaa bbb', 'ccc']);
  });

  it('should cut words longer than a chunk', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });
});

describe('WhatsAppNotificationDispatcher', () => {
  const owner = buildEmployee({ phone: '+15550100001' });
  const context = { request: buildRequest(), employee: owner, recipient: owner };

  it('should send the rendered message to the recipient\'s number', async () => {
    const adapter = twilioAdapter();

    const sid = await dispatcherWith(adapter).send('emp-1', 'approved', context, KEY);

    expect(sid).toBe('SM1');
    const config = adapter.mock.calls[0]?.[0];
    expect(config?.method).toBe('post');
    expect(config?.baseURL).toBe('https://twilio.test/2010-04-01');
    expect(config?.url).toBe('/Accounts/AC123/Messages.json');
    expect(config?.auth).toEqual({ username: 'AC123', password: 'test-secret' });
    const form = new URLSearchParams(String(config?.data));
    expect(form.get('From')).toBe('whatsapp:+15550009999');
    expect(form.get('To')).toBe('whatsapp:+15550100001');
    expect(form.get('Body')).toBe(
      '*Leave approved*\n\nHi Ada Okafor,\n\nYour annual leave for Mon 3 Jun 2024 to Fri 7 Jun 2024 (5 days) was approved.'
    );
  });

  it('should send long messages in several chunks', async () => {
    const adapter = twilioAdapter();
    const longReason = buildRequest({ reason: 'word '.repeat(400).trim() });

    const sids = await dispatcherWith(adapter).send(
      'mgr-1',
      'submitted',
      { request: longReason, employee: owner, recipient: buildEmployee({ id: 'mgr-1', name: 'Mateo Lind', phone: '+15550100002' }) },
      KEY
    );

    // header up to the reason line, then the reason split on spaces
    expect(adapter).toHaveBeenCalledTimes(3);
    expect(sids).toBe('SM1,SM2,SM3');
  });

  it('should fail permanently for a recipient without a phone number', async () => {
    const adapter = twilioAdapter();

    await expect(
      dispatcherWith(adapter).send('emp-1', 'approved', { ...context, recipient: buildEmployee() }, KEY)
    ).rejects.toMatchObject({ kind: 'permanent', message: 'Employee emp-1 has no phone number for WhatsApp' });
    expect(adapter).not.toHaveBeenCalled();
  });

  it('should report a rejected number as permanent', async () => {
    await expect(dispatcherWith(twilioAdapter(400)).send('emp-1', 'approved', context, KEY)).rejects.toMatchObject({
      kind: 'permanent',
      code: 'ADAPTER_PERMANENT',
      message: 'WhatsApp send failed with HTTP 400: Request failed with status code 400',
    });
  });

  it('should report Twilio outages as transient', async () => {
    await expect(dispatcherWith(twilioAdapter(503)).send('emp-1', 'approved', context, KEY)).rejects.toMatchObject({
      kind: 'transient',
      details: { status: 503 },
    });
  });
});
