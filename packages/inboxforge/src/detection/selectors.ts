/**
 * Ordered element probes for the signup flow. The flow is A/B tested, so
 * each step lists every variant seen in the wild; the first visible match
 * wins. Order is priority.
 */

export interface FieldProbe {
  /** Short name used in job log entries */
  name: string;
  selector: string;
}

export interface EmailProbe extends FieldProbe {
  /** Whether the field takes the whole address or only the part before "@" */
  fill: 'full_address' | 'local_part';
}

export const EMAIL_FIELD_PROBES: readonly EmailProbe[] = [
  { name: 'member_name', selector: 'input[name="MemberName"]', fill: 'local_part' },
  { name: 'new_email', selector: 'input[type="email"]', fill: 'full_address' },
  { name: 'email_aria', selector: 'input[aria-label*="email" i]', fill: 'full_address' },
  { name: 'username', selector: 'input[name="username"]', fill: 'full_address' },
];

export const PASSWORD_FIELD_PROBES: readonly FieldProbe[] = [
  { name: 'password_name', selector: 'input[name="Password"]' },
  { name: 'password_input_id', selector: '#PasswordInput' },
  { name: 'password_type', selector: 'input[type="password"]' },
];

export const CONTINUE_PROBES: readonly FieldProbe[] = [
  { name: 'primary_button', selector: 'button[data-testid="primaryButton"]' },
  { name: 'signup_action', selector: '#iSignupAction' },
  { name: 'submit_input', selector: 'input[type="submit"]' },
  { name: 'submit_button', selector: 'button[type="submit"]' },
  { name: 'next_text', selector: 'button:has-text("Next")' },
];

export const PASSWORD_SUBMIT_PROBES: readonly FieldProbe[] = [
  { name: 'primary_button', selector: 'button[data-testid="primaryButton"]' },
  { name: 'signup_action', selector: '#iSignupAction' },
  { name: 'submit_input', selector: 'input[type="submit"]' },
  { name: 'submit_button', selector: 'button[type="submit"]' },
  { name: 'create_text', selector: 'button:has-text("Create account")' },
  { name: 'next_text', selector: 'button:has-text("Next")' },
];

/** Value to type into an email probe for the given address. */
export function emailValueFor(probe: EmailProbe, address: string): string {
  if (probe.fill === 'full_address') return address;
  const at = address.indexOf('@');
  return at === -1 ? address : address.slice(0, at);
}
