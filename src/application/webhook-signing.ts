import { createHmac, timingSafeEqual } from "node:crypto";

export const NOTIFICATION_SIGNED_FIELDS = [
  "cpm_site_id",
  "cpm_trans_id",
  "cpm_trans_date",
  "cpm_amount",
  "cpm_currency",
  "signature",
  "payment_method",
  "cel_phone_num",
  "cpm_phone_prefixe",
  "cpm_language",
  "cpm_version",
  "cpm_payment_config",
  "cpm_page_action",
  "cpm_custom",
  "cpm_designation",
  "cpm_error_message",
] as const;

export type NotificationFields = Readonly<Record<string, string | undefined>>;

export function canonicalNotificationPayload(fields: NotificationFields): string {
  return NOTIFICATION_SIGNED_FIELDS.map((name) => fields[name] ?? "").join("");
}

export function signNotification(secret: string, fields: NotificationFields): string {
  return createHmac("sha256", secret).update(canonicalNotificationPayload(fields)).digest("hex");
}

export function verifyNotificationSignature(
  secret: string,
  fields: NotificationFields,
  signature: string | undefined,
): boolean {
  if (!signature) {
    return false;
  }
  const expected = Buffer.from(signNotification(secret, fields), "utf8");
  const received = Buffer.from(signature.trim().toLowerCase(), "utf8");
  if (expected.length !== received.length) {
    return false;
  }
  return timingSafeEqual(expected, received);
}
