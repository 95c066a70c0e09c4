import type Database from 'better-sqlite3';
import { ApiError } from '../api/errors.js';
import type { VitalView } from '../contracts/types.js';
import type { Store } from '../store/database.js';
import type { VitalRow } from '../store/types.js';
import { parseInstant } from '../lib/time.js';
import { toVitalView } from './view.js';

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 500;

/** Raw query-string values; anything absent or empty takes its default. */
export interface HistoryQuery {
    from?: string;
    to?: string;
    page?: string;
    page_size?: string;
}

export interface HistoryPage {
    results: VitalView[];
    page: number;
    page_size: number;
    total: number;
}

interface HistoryFilter {
    patient_id: string;
    from_ms: number | null;
    to_ms: number | null;
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
    if (value === undefined || value === '') {
        return fallback;
    }
    if (!/^\s*[+-]?\d+\s*$/.test(value)) {
        throw new Error(`invalid literal for ${name}: '${value}'`);
    }
    const parsed = parseInt(value, 10);
    if (!Number.isSafeInteger(parsed)) {
        throw new Error(`${name} out of range: '${value}'`);
    }
    return parsed;
}

function parseBound(value: string | undefined): number | null {
    return value ? parseInstant(value).getTime() : null;
}

const WHERE = `patient_id = @patient_id
    AND (@from_ms IS NULL OR timestamp_ms >= @from_ms)
    AND (@to_ms IS NULL OR timestamp_ms <= @to_ms)`;

export class VitalsQueries {
    private selectLatest: Database.Statement<[string], VitalRow>;
    private countHistory: Database.Statement<[HistoryFilter], { total: number }>;
    private selectHistory: Database.Statement<[HistoryFilter & { limit: number; offset: number }], VitalRow>;

    constructor(db: Store) {
        this.selectLatest = db.prepare<[string], VitalRow>(
            'SELECT * FROM vitals WHERE patient_id = ? ORDER BY timestamp_ms DESC, rowid DESC LIMIT 1',
        );
        this.countHistory = db.prepare<[HistoryFilter], { total: number }>(
            `SELECT COUNT(*) AS total FROM vitals WHERE ${WHERE}`,
        );
        this.selectHistory = db.prepare<[HistoryFilter & { limit: number; offset: number }], VitalRow>(
            `SELECT * FROM vitals WHERE ${WHERE}
             ORDER BY timestamp_ms DESC, rowid DESC
             LIMIT @limit OFFSET @offset`,
        );
    }

    latest(patientId: string): VitalView {
        const row = this.selectLatest.get(patientId);
        if (!row) {
            throw new ApiError('not_found', 'No readings for patient');
        }
        return toVitalView(row);
    }

    /**
     * Newest-first page of a patient's readings. `from` and `to` are
     * inclusive; `total` ignores pagination.
     */
    history(patientId: string, query: HistoryQuery): HistoryPage {
        let filter: HistoryFilter;
        let page: number;
        let pageSize: number;

        try {
            filter = {
                patient_id: patientId,
                from_ms: parseBound(query.from),
                to_ms: parseBound(query.to),
            };
            page = Math.max(parseInteger('page', query.page, 1), 1);
            pageSize = Math.min(Math.max(parseInteger('page_size', query.page_size, DEFAULT_PAGE_SIZE), 1), MAX_PAGE_SIZE);
            if (!Number.isSafeInteger((page - 1) * pageSize)) {
                throw new Error(`page out of range: '${query.page ?? ''}'`);
            }
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new ApiError('bad_request', 'Invalid query parameters', message);
        }

        const total = this.countHistory.get(filter)?.total ?? 0;
        const rows = this.selectHistory.all({
            ...filter,
            limit: pageSize,
            offset: (page - 1) * pageSize,
        });

        return {
            results: rows.map(toVitalView),
            page,
            page_size: pageSize,
            total,
        };
    }
}
