import { createHmac } from "node:crypto"

/** Turns a notification contact into the opaque value stored on jobs. */
export type NotificationTransform = (contact: string) => string

export function createNotificationTransform(secret: string): NotificationTransform {
  return (contact) =>
    createHmac("sha256", secret).update(contact.trim().toLowerCase()).digest("hex")
}
