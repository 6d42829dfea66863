const SHOW_LAST = 4;

/** `9999912345` -> `***2345`; short values are fully masked. */
export function maskPhone(phone: string | null | undefined): string {
  if (!phone) {
    return '';
  }
  if (phone.length <= SHOW_LAST) {
    return '*'.repeat(phone.length);
  }
  return `***${phone.slice(-SHOW_LAST)}`;
}

/** `asha@example.com` -> `a***@example.com` */
export function maskEmail(email: string | null | undefined): string {
  if (!email) {
    return '';
  }
  const at = email.lastIndexOf('@');
  if (at <= 0) {
    return '[REDACTED]';
  }
  return `${email[0]}***${email.slice(at)}`;
}

/** Loggable form of a contact tuple. */
export function redactContact(contact: {
  phone?: string | null;
  email?: string | null;
}): { phone: string; email: string } {
  return {
    phone: maskPhone(contact.phone),
    email: maskEmail(contact.email),
  };
}
