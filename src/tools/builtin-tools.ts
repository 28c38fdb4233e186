/**
 * Built-in tools: calculator, word_counter, date_time
 */

import _ from 'lodash';
import { z } from 'zod';
import type { ToolInputSchema } from '../server/protocol.js';
import { TextTool } from './tool-implementation.js';

const CalculatorArgsSchema = z.object({
    operation: z.enum(['add', 'subtract', 'multiply', 'divide']),
    a:         z.number(),
    b:         z.number(),
});

type CalculatorArgs = z.infer<typeof CalculatorArgsSchema>;

export class CalculatorTool extends TextTool<CalculatorArgs> {
    override readonly name = 'calculator';
    override readonly description = 'Perform basic arithmetic calculations';
    override readonly argsSchema = CalculatorArgsSchema;
    override readonly inputSchema: ToolInputSchema = {
        type:       'object',
        properties: {
            operation: {
                type:        'string',
                enum:        ['add', 'subtract', 'multiply', 'divide'],
                description: 'The operation to perform',
            },
            a: { type: 'number', description: 'First operand' },
            b: { type: 'number', description: 'Second operand' },
        },
        required: ['operation', 'a', 'b'],
    };

    override get canRunInBackground(): boolean {
        return true;
    }

    override async executeText({ operation, a, b }: CalculatorArgs): Promise<string> {
        switch(operation) {
            case 'add':
                return String(a + b);
            case 'subtract':
                return String(a - b);
            case 'multiply':
                return String(a * b);
            case 'divide':
                if(b === 0) {
                    throw new RangeError('Division by zero');
                }
                return String(a / b);
        }
    }
}

const WordCounterArgsSchema = z.object({
    text:        z.string(),
    countSpaces: z.boolean().default(true),
});

type WordCounterArgs = z.infer<typeof WordCounterArgsSchema>;

export class WordCounterTool extends TextTool<WordCounterArgs> {
    override readonly name = 'word_counter';
    override readonly description = 'Count words, characters, and sentences in text';
    override readonly argsSchema = WordCounterArgsSchema;
    override readonly inputSchema: ToolInputSchema = {
        type:       'object',
        properties: {
            text: { type: 'string', description: 'Text to analyze' },
            countSpaces: {
                type:        'boolean',
                description: 'Whether to include spaces in character count',
                default:     true,
            },
        },
        required: ['text'],
    };

    override get canRunInBackground(): boolean {
        return true;
    }

    override async executeText({ text, countSpaces }: WordCounterArgs): Promise<string> {
        const words = _.filter(_.split(text, /\s+/), word => word.length > 0).length;
        const characters = countSpaces ? text.length : _.replace(text, /\s/g, '').length;
        const sentences = (text.match(/[.!?]+/g) ?? []).length;

        return [
            `Words: ${words}`,
            `Characters: ${characters} ${countSpaces ? '(including spaces)' : '(excluding spaces)'}`,
            `Sentences: ${sentences}`,
        ].join('\n');
    }
}

const DateTimeArgsSchema = z.object({
    format:   z.enum(['full', 'date', 'time']).default('full'),
    timezone: z.enum(['UTC', 'local']).default('local'),
});

type DateTimeArgs = z.infer<typeof DateTimeArgsSchema>;

export class DateTimeTool extends TextTool<DateTimeArgs> {
    override readonly name = 'date_time';
    override readonly description = 'Get current date and time information';
    override readonly argsSchema = DateTimeArgsSchema;
    override readonly inputSchema: ToolInputSchema = {
        type:       'object',
        properties: {
            format: {
                type:        'string',
                description: 'Output format (full, date, time)',
                enum:        ['full', 'date', 'time'],
                default:     'full',
            },
            timezone: {
                type:        'string',
                description: 'Timezone (UTC, local)',
                enum:        ['UTC', 'local'],
                default:     'local',
            },
        },
    };

    override async executeText({ format, timezone }: DateTimeArgs): Promise<string> {
        return formatDateTime(new Date(), format, timezone === 'UTC');
    }
}

/**
 * `date` is YYYY-MM-DD, `time` is HH:mm:ss, `full` is an ISO timestamp in UTC and
 * `YYYY-MM-DD HH:mm:ss.SSS` in local time
 */
export function formatDateTime(now: Date, format: DateTimeArgs['format'], utc: boolean): string {
    const pad = (value: number, length = 2) => _.padStart(String(value), length, '0');
    const year = utc ? now.getUTCFullYear() : now.getFullYear();
    const month = (utc ? now.getUTCMonth() : now.getMonth()) + 1;
    const day = utc ? now.getUTCDate() : now.getDate();
    const hours = utc ? now.getUTCHours() : now.getHours();
    const minutes = utc ? now.getUTCMinutes() : now.getMinutes();
    const seconds = utc ? now.getUTCSeconds() : now.getSeconds();

    const date = `${year}-${pad(month)}-${pad(day)}`;
    const time = `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;

    switch(format) {
        case 'date':
            return date;
        case 'time':
            return time;
        case 'full':
            return utc ? now.toISOString() : `${date} ${time}.${pad(now.getMilliseconds(), 3)}`;
    }
}

export function createBuiltinTools(): [CalculatorTool, WordCounterTool, DateTimeTool] {
    return [new CalculatorTool(), new WordCounterTool(), new DateTimeTool()];
}
