import { z } from 'zod';
import { ValidationError } from '../../services/base/ServiceError';

const idSchema = z.number().int().nonnegative().describe('0 until persisted');
const nonBlank = (field: string) =>
  z.string().refine(value => value.trim().length > 0, { message: `${field} cannot be empty` });

export const CoordinateSchema = z.object({
  latitude: z.number().finite().min(-90).max(90).describe('Degrees, -90..90'),
  longitude: z.number().finite().min(-180).max(180).describe('Degrees, -180..180'),
});

export const SettingSchema = z.object({
  id: idSchema,
  key: nonBlank('Key'),
  value: z.string(),
  description: z.string().nullable(),
  timestamp: z.date(),
});

export const LocationSchema = z.object({
  id: idSchema,
  title: nonBlank('Title'),
  description: z.string().max(500),
  latitude: CoordinateSchema.shape.latitude,
  longitude: CoordinateSchema.shape.longitude,
  city: z.string(),
  state: z.string(),
  photoPath: z.string().nullable(),
  isDeleted: z.boolean(),
  timestamp: z.date(),
});

export const TipTypeSchema = z.object({
  id: idSchema,
  name: nonBlank('Name'),
  i8n: nonBlank('Locale'),
});

export const TipSchema = z.object({
  id: idSchema,
  tipTypeId: z.number().int().positive(),
  title: nonBlank('Title'),
  content: z.string(),
  fstop: z.string(),
  shutterSpeed: z.string(),
  iso: z.string(),
  i8n: nonBlank('Locale'),
});

export const WeatherForecastSchema = z.object({
  id: idSchema,
  weatherId: idSchema,
  date: z.date(),
  sunrise: z.date(),
  sunset: z.date(),
  temperature: z.number().finite(),
  minTemperature: z.number().finite(),
  maxTemperature: z.number().finite(),
  description: z.string(),
  icon: z.string(),
  windSpeed: z.number().nonnegative(),
  windDirection: z.number().min(0).max(360),
  windGust: z.number().nonnegative().nullable(),
  humidity: z.number().int().min(0).max(100),
  pressure: z.number().int().nonnegative(),
  clouds: z.number().int().min(0).max(100),
  uvIndex: z.number().nonnegative(),
  precipitation: z.number().nonnegative().nullable(),
  moonRise: z.date().nullable(),
  moonSet: z.date().nullable(),
  moonPhase: z.number().min(0).max(1).describe('0 = new moon, 0.5 = full moon'),
});

export const WeatherSchema = z.object({
  id: idSchema,
  locationId: z.number().int().positive(),
  latitude: CoordinateSchema.shape.latitude,
  longitude: CoordinateSchema.shape.longitude,
  timezone: nonBlank('Timezone'),
  timezoneOffset: z.number().int(),
  lastUpdate: z.date(),
});

export const SubscriptionStatusSchema = z.enum(['active', 'expired', 'cancelled', 'pending', 'paused']);

export const SubscriptionSchema = z.object({
  id: idSchema,
  userId: nonBlank('User id'),
  productId: nonBlank('Product id'),
  transactionId: nonBlank('Transaction id'),
  purchaseToken: z.string(),
  status: SubscriptionStatusSchema,
  startDate: z.date(),
  expirationDate: z.date(),
  autoRenewing: z.boolean(),
  lastVerified: z.date().nullable(),
  cancelledAt: z.date().nullable(),
  renewalCount: z.number().int().nonnegative(),
});

/**
 * Parses a domain value, throwing ValidationError with the zod issues attached.
 */
export function validateDomain<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, entity: string, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${entity}: ${message}`, result.error.issues);
  }
  return result.data;
}
