import type { AttachmentDetails, AttachmentRecord, ZoteroRecord } from '../zotero/types.js';
import { logDebug } from '../telemetry/logger.js';
import type { RecordClient } from './record_client.js';

export function toAttachmentDetails(record: AttachmentRecord): AttachmentDetails {
  return {
    key: record.key,
    title: record.title ?? 'Untitled',
    filename: record.filename ?? '',
    contentType: record.contentType ?? '',
  };
}

/**
 * Pick the single best attachment for a record: PDF first, then HTML, then
 * anything else, keeping child order within each bucket. No attachment is a
 * normal result, so a failed child listing also yields null.
 */
export async function selectAttachment(
  client: Pick<RecordClient, 'listChildren'>,
  record: ZoteroRecord
): Promise<AttachmentDetails | null> {
  if (record.kind === 'attachment') {
    return toAttachmentDetails(record);
  }

  const children = await client.listChildren(record.key);
  if (children.status !== 'ok') {
    logDebug('[attachments] no children to select from', {
      key: record.key,
      status: children.status,
      reason: children.status === 'empty' ? children.reason : children.error.message,
    });
    return null;
  }

  const pdfs: AttachmentDetails[] = [];
  const htmls: AttachmentDetails[] = [];
  const others: AttachmentDetails[] = [];

  for (const child of children.value) {
    if (child.kind !== 'attachment') continue;
    const details = toAttachmentDetails(child);
    if (details.contentType === 'application/pdf') {
      pdfs.push(details);
    } else if (details.contentType.startsWith('text/html')) {
      htmls.push(details);
    } else {
      others.push(details);
    }
  }

  for (const bucket of [pdfs, htmls, others]) {
    if (bucket.length > 0) {
      return bucket[0] ?? null;
    }
  }
  return null;
}
