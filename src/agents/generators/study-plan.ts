/**
 * Day-by-day study plan up to the exam date.
 *
 * A missing, malformed or past exam date is replaced by today + 30 days.
 * The replacement is flagged in the metadata and logged as a warning.
 */

import { z } from 'zod';
import { TaskGenerator, type GenerationRequest, type GeneratorOptions } from './base.js';
import type { StudyPlanMeta, TaskResult } from './types.js';
import type { StreamCallbacks } from '../types.js';
import type { LLMProvider } from '../../providers/types.js';
import { nonEmptyString } from '../../utils/validation.js';
import { logger } from '../../utils/logger.js';

export const FALLBACK_STUDY_DAYS = 30;

const MS_PER_DAY = 86_400_000;

export interface NormalizedExamDate {
    examDate: string;
    daysAvailable: number;
    adjusted: boolean;
    requested?: string;
}

/** Midnight UTC of the given calendar day, as a day count. */
function dayNumber(year: number, monthIndex: number, day: number): number {
    return Date.UTC(year, monthIndex, day) / MS_PER_DAY;
}

function formatDay(dayNum: number): string {
    return new Date(dayNum * MS_PER_DAY).toISOString().slice(0, 10);
}

/** Parse a strict `YYYY-MM-DD` calendar date, or undefined when it is not a real date. */
function parseCalendarDate(value: string): number | undefined {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
    if (!match) return undefined;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const parsed = new Date(Date.UTC(year, month - 1, day));

    if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
        return undefined;
    }
    return dayNumber(year, month - 1, day);
}

/**
 * Resolve the exam date against today's local calendar date.
 *
 * Days available is the calendar-day difference; fewer than one day, or an
 * unusable date, becomes today + 30 days.
 */
export function normalizeExamDate(input: string | Date | undefined, now: Date): NormalizedExamDate {
    const today = dayNumber(now.getFullYear(), now.getMonth(), now.getDate());

    let requested: string | undefined;
    let examDay: number | undefined;

    if (input instanceof Date) {
        if (!Number.isNaN(input.getTime())) {
            examDay = dayNumber(input.getFullYear(), input.getMonth(), input.getDate());
            requested = formatDay(examDay);
        } else {
            requested = String(input);
        }
    } else if (input !== undefined && input.trim() !== '') {
        requested = input.trim();
        examDay = parseCalendarDate(requested);
    }

    if (examDay !== undefined && examDay - today >= 1) {
        return { examDate: formatDay(examDay), daysAvailable: examDay - today, adjusted: false, requested };
    }

    return {
        examDate: formatDay(today + FALLBACK_STUDY_DAYS),
        daysAvailable: FALLBACK_STUDY_DAYS,
        adjusted: true,
        requested,
    };
}

function studyPlanParamsSchema(clock: () => Date) {
    return z
        .object({
            topics: z.array(nonEmptyString).min(1, 'At least one topic is required'),
            examDate: z.union([z.string(), z.date()]).optional(),
            hoursPerDay: z.number().min(0.5).max(24).default(3),
        })
        .transform((params) => ({
            topics: params.topics,
            hoursPerDay: params.hoursPerDay,
            exam: normalizeExamDate(params.examDate, clock()),
        }));
}

type StudyPlanSchema = ReturnType<typeof studyPlanParamsSchema>;
type StudyPlanParams = z.output<StudyPlanSchema>;

export class StudyPlanGenerator extends TaskGenerator<StudyPlanSchema, StudyPlanMeta> {
    protected readonly paramsSchema: StudyPlanSchema;

    constructor(provider: LLMProvider, options: GeneratorOptions) {
        super('study-plan', provider, options);
        this.paramsSchema = studyPlanParamsSchema(this.clock);
    }

    override async generate(
        topic: string,
        context: string,
        params: z.input<StudyPlanSchema>,
        callbacks?: StreamCallbacks,
    ): Promise<TaskResult<StudyPlanMeta>> {
        const result = await super.generate(topic, context, params, callbacks);
        const meta = result.metadata;

        if (meta.examDateAdjusted) {
            const requested = meta.requestedExamDate ? `"${meta.requestedExamDate}"` : 'No exam date';
            logger.warn(`${requested} is not a usable future date; planned for ${meta.examDate} (${meta.daysAvailable} days).`);
        }
        return result;
    }

    protected buildUserPrompt({ context, params }: GenerationRequest<StudyPlanParams>): string {
        const { exam } = params;
        const lines = [
            'Create a DETAILED day-by-day study schedule.',
            '',
            `IMPORTANT: The exam is on ${exam.examDate} (${exam.daysAvailable} days from now).`,
            '',
            'INPUTS:',
            '- Topics to cover:',
            ...params.topics.map((t) => `  - ${t}`),
            `- Days until exam: ${exam.daysAvailable} days`,
            `- Study hours per day: ${params.hoursPerDay} hours`,
        ];

        if (context) {
            lines.push('', 'NOTES FROM STUDY MATERIALS:', context);
        }

        lines.push('', 'Generate a COMPLETE study plan now:');
        return lines.join('\n');
    }

    protected buildMetadata({ params }: GenerationRequest<StudyPlanParams>): StudyPlanMeta {
        const { exam } = params;
        return {
            kind: 'study-plan',
            topics: params.topics,
            examDate: exam.examDate,
            daysAvailable: exam.daysAvailable,
            hoursPerDay: params.hoursPerDay,
            examDateAdjusted: exam.adjusted,
            ...(exam.requested !== undefined ? { requestedExamDate: exam.requested } : {}),
        };
    }
}
