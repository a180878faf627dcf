/**
 * store.ts — write-ahead хранилище элементов очереди.
 *
 * Каждый незавершённый элемент лежит на диске отдельным JSON-файлом
 * до тех пор, пока его обработчик не вернёт управление.
 * После падения процесса loadPending() возвращает «сирот» для повторной обработки.
 */

import fs from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';

export interface WriteAheadRecord {
  id: string;
  laneId: string;
  payload: string;
  /** ms since epoch, строго возрастает в пределах процесса */
  enqueuedAt: number;
}

const PENDING_EXT = '.pending.json';
const TMP_EXT = '.tmp';

function isObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function isRecord(r: unknown): r is WriteAheadRecord {
  return isObject(r)
    && typeof r.id === 'string'
    && typeof r.laneId === 'string'
    && typeof r.payload === 'string'
    && typeof r.enqueuedAt === 'number';
}

/** laneId → безопасный фрагмент имени файла (в т.ч. для Windows) */
export function encodeLaneId(laneId: string): string {
  return encodeURIComponent(laneId)
    .replace(/[!'()*~.]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

export class WriteAheadStore {
  private lastEnqueuedAt = 0;

  /** Бросает, если директорию создать нельзя — это фатально для процесса */
  constructor(readonly dir: string) {
    fs.mkdirSync(dir, { recursive: true });
    console.log(`[waq] storage_ready dir=${path.resolve(dir)}`);
  }

  private nextTimestamp(): number {
    this.lastEnqueuedAt = Math.max(Date.now(), this.lastEnqueuedAt + 1);
    return this.lastEnqueuedAt;
  }

  private fileFor(recordId: string): string {
    return path.join(this.dir, `${recordId}${PENDING_EXT}`);
  }

  /**
   * Записать элемент на диск до постановки в очередь.
   * Ошибка записи логируется, но не прерывает enqueue: id возвращается всегда.
   */
  write(laneId: string, payload: string): WriteAheadRecord {
    const enqueuedAt = this.nextTimestamp();
    const id = `${encodeLaneId(laneId)}__${enqueuedAt}__${randomBytes(4).toString('hex')}`;
    const record: WriteAheadRecord = { id, laneId, payload, enqueuedAt };
    const target = this.fileFor(id);
    const tmp = `${target}${TMP_EXT}`;
    try {
      fs.writeFileSync(tmp, JSON.stringify(record), 'utf-8');
      fs.renameSync(tmp, target);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`[waq] write_failed id=${id} reason=${msg}`);
    }
    return record;
  }

  /** Удалить запись завершённого элемента. Отсутствующий id — no-op. */
  complete(recordId: string): void {
    try {
      fs.rmSync(this.fileFor(recordId), { force: true });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`[waq] complete_failed id=${recordId} reason=${msg}`);
    }
  }

  /** Все незавершённые записи, по возрастанию enqueuedAt */
  loadPending(): WriteAheadRecord[] {
    let files: string[];
    try {
      files = fs.readdirSync(this.dir).filter(f => f.endsWith(PENDING_EXT));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`[waq] scan_failed dir=${this.dir} reason=${msg}`);
      return [];
    }

    const records: WriteAheadRecord[] = [];
    for (const file of files) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(path.join(this.dir, file), 'utf-8'));
        if (!isRecord(parsed)) {
          console.warn(`[waq] record_skipped file=${file} reason=malformed`);
          continue;
        }
        records.push(parsed);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.warn(`[waq] record_skipped file=${file} reason=${msg}`);
      }
    }

    records.sort((a, b) => a.enqueuedAt - b.enqueuedAt || a.id.localeCompare(b.id));
    if (records.length > 0) {
      console.log(`[waq] orphans_found count=${records.length}`);
    }
    return records;
  }
}
