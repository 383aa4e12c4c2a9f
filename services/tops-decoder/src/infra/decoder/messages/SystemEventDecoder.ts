import type { SystemEventKind } from '@/domain/models/TopsMessage';
import { readTimestamp, TAG_SIZE, TIMESTAMP_SIZE } from '../primitives';
import type { ShapeResult } from './ShapeDecoder';

export const SYSTEM_EVENT_TAG = 0x53;

const OFFSET_EVENT_CODE = TAG_SIZE;
const OFFSET_TIMESTAMP = OFFSET_EVENT_CODE + 1;

export const SYSTEM_EVENT_BODY_LENGTH = OFFSET_TIMESTAMP + TIMESTAMP_SIZE - TAG_SIZE;

// 外側のタグ 0x53 の次に来るイベントコード
const SYSTEM_EVENT_CODES: ReadonlyMap<number, SystemEventKind> = new Map([
  [0x4f, 'start_of_messages'],
  [0x53, 'start_of_system_hours'],
  [0x52, 'start_of_regular_hours'],
  [0x4d, 'end_of_regular_hours'],
  [0x45, 'end_of_system_hours'],
  [0x43, 'end_of_messages'],
]);

export function decodeSystemEvent<S>(view: DataView): ShapeResult<S> {
  const code = view.getUint8(OFFSET_EVENT_CODE);
  const kind = SYSTEM_EVENT_CODES.get(code);
  if (kind === undefined) {
    return { ok: false, reason: `unknown system event code 0x${code.toString(16).padStart(2, '0')}` };
  }

  return {
    ok: true,
    message: {
      type: 'system_event',
      kind,
      timestamp: readTimestamp(view, OFFSET_TIMESTAMP),
    },
  };
}
