import { z, ZodError } from 'zod';
import { ServiceTier } from './models';
import { ValidationError } from './errors';

const MAX_POSTAL_CODE = 99_999_999;

export const postalRangeSchema = z.object({
    start: z.number()
        .int('Postal code must be an integer')
        .min(0, 'Postal code cannot be negative')
        .max(MAX_POSTAL_CODE, 'Postal code must have at most 8 digits'),
    end: z.number()
        .int('Postal code must be an integer')
        .min(0, 'Postal code cannot be negative')
        .max(MAX_POSTAL_CODE, 'Postal code must have at most 8 digits'),
    label: z.string().min(1, 'Range label is required'),
}).refine(
    (range) => range.start <= range.end,
    { message: 'Range start must not exceed range end', path: ['end'] },
);

export const weightBracketSchema = z.object({
    startGrams: z.number().int('Weight must be whole grams').positive('Weight must be positive'),
    endGrams: z.number().int('Weight must be whole grams').positive('Weight must be positive'),
}).refine(
    (bracket) => bracket.startGrams <= bracket.endGrams,
    { message: 'Bracket start must not exceed bracket end', path: ['endGrams'] },
);

export const catalogSchema = z.object({
    postalRanges: z.array(postalRangeSchema).min(1, 'At least one postal range is required'),
    weightBrackets: z.array(weightBracketSchema).min(1, 'At least one weight bracket is required'),
});

export type CatalogDefinition = z.infer<typeof catalogSchema>;

const dimensionSchema = z.number()
    .int('Dimensions are whole centimetres')
    .positive('Dimensions must be positive');

export const quoteRequestSchema = z.object({
    tier: z.nativeEnum(ServiceTier),
    destinationPostalCode: z.string()
        .regex(/^\d{8}$/, 'Destination postal code must be exactly 8 digits'),
    weightGrams: z.number().int('Weight must be whole grams').positive('Weight must be positive'),
    declaredValue: z.number().nonnegative('Declared value cannot be negative'),
    dimensions: z.object({
        heightCm: dimensionSchema,
        widthCm: dimensionSchema,
        depthCm: dimensionSchema,
    }),
});

export function toValidationError(message: string, err: ZodError): ValidationError {
    return new ValidationError(message, {
        issues: err.issues.map(issue => ({
            field: issue.path.join('.'),
            message: issue.message,
        })),
    });
}

export function validateCatalog(input: unknown): CatalogDefinition {
    const result = catalogSchema.safeParse(input);
    if (!result.success) {
        throw toValidationError('Invalid range catalog', result.error);
    }
    return result.data;
}

export function validateQuoteRequest(input: unknown) {
    const result = quoteRequestSchema.safeParse(input);
    if (!result.success) {
        throw toValidationError('Invalid quote request', result.error);
    }
    return result.data;
}
