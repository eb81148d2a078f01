import { z } from 'zod';

import type { ExtractedContact, ToolHandler } from './types';

const MIN_PHONE_DIGITS = 5;

const contactArgumentsSchema = z
  .object({
    name: z.string().trim().optional(),
    phone: z.string().optional(),
    phone_number: z.string().optional(),
    email: z.string().trim().email('email must be a valid address').optional(),
  })
  .passthrough();

/** Keep a leading `+` and the digits; anything shorter than a plausible number is dropped. */
export function normalizePhone(raw: string | undefined): string | undefined {
  if (!raw) {
    return undefined;
  }

  const trimmed = raw.trim();
  const digits = trimmed.replace(/\D/g, '');
  if (digits.length < MIN_PHONE_DIGITS) {
    return undefined;
  }

  return trimmed.startsWith('+') ? `+${digits}` : digits;
}

export const captureContact: ToolHandler = ({ arguments: args }) => {
  const parsed = contactArgumentsSchema.safeParse(args);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.');
    return {
      ok: false,
      error: `Invalid contact arguments: ${path ? `${path} ` : ''}${issue?.message ?? 'unknown issue'}`,
    };
  }

  const contact: ExtractedContact = {};
  const name = parsed.data.name;
  const phone = normalizePhone(parsed.data.phone ?? parsed.data.phone_number);
  const email = parsed.data.email?.toLowerCase();

  if (name) {
    contact.name = name;
  }
  if (phone) {
    contact.phone = phone;
  }
  if (email) {
    contact.email = email;
  }

  if (!contact.phone && !contact.email) {
    return { ok: false, error: 'Contact requires a phone number or an email address' };
  }

  return {
    ok: true,
    output: { status: 'success', message: 'Contact information saved and notification sent' },
    effects: [{ type: 'contact_captured', contact }],
  };
};
