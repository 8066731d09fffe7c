// Alert Formatter
// Maps a change event to a webhook embed; pure, the clock is passed in

import { ChangeEvent, SnapshotElement } from '../types/types';
import { WebhookEmbed, WebhookField } from '../ports/notificationTransport';
import { getEntityDescriptor } from '../kinds/entityKinds';

// Webhook limits: 1024 characters per field value, 4096 per description
export const MAX_FIELD_VALUE_LENGTH = 1024;
export const MAX_DESCRIPTION_LENGTH = 4096;
const EMPTY_LIST = '(none)';
const ELLIPSIS = '…';

export function formatElements(elements: readonly SnapshotElement[]): string {
  return elements.length > 0 ? elements.join(', ') : EMPTY_LIST;
}

export function truncateFieldValue(value: string, maxLength: number = MAX_FIELD_VALUE_LENGTH): string {
  if (value.length <= maxLength) {
    return value;
  }
  return value.substring(0, maxLength - ELLIPSIS.length) + ELLIPSIS;
}

/**
 * `YYYY-MM-DD HH:MM:SS UTC`
 */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').substring(0, 19) + ' UTC';
}

function field(name: string, value: string): WebhookField {
  return { name, value: truncateFieldValue(value), inline: false };
}

function changedElements(event: ChangeEvent): readonly SnapshotElement[] {
  switch (event.type) {
    case 'FirstObservation':
      return event.current;
    case 'Added':
      return event.added;
    case 'Removed':
      return event.removed;
  }
}

/**
 * Fields: subject (target or subnet), full current set, changed subset where
 * the event has one, then the timestamp
 */
export function buildAlertEmbed<T extends SnapshotElement>(
  event: ChangeEvent<T>,
  subject: string,
  now: Date
): WebhookEmbed {
  const descriptor = getEntityDescriptor(event.kind);
  const template = descriptor.alerts[event.type];

  const fields: WebhookField[] = [
    field(descriptor.subjectLabel, subject),
    field(template.currentFieldName, formatElements(event.current)),
  ];
  if (event.type !== 'FirstObservation' && template.changedFieldName) {
    fields.push(field(template.changedFieldName, formatElements(changedElements(event))));
  }
  fields.push(field('Timestamp', formatUtcTimestamp(now)));

  return {
    title: template.title,
    description: truncateFieldValue(template.describe(subject, formatElements(changedElements(event))), MAX_DESCRIPTION_LENGTH),
    color: template.color,
    fields,
  };
}
