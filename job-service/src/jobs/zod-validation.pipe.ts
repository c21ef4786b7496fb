import { BadRequestException, PipeTransform } from '@nestjs/common';
import { z } from 'zod';

/** Validates a request body against a zod schema and hands on the parsed value. */
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
    constructor(private readonly schema: z.ZodType<T>) { }

    transform(value: unknown): T {
        const parsed = this.schema.safeParse(value);
        if (!parsed.success) {
            throw new BadRequestException(z.prettifyError(parsed.error));
        }
        return parsed.data;
    }
}
