/**
 * Zod validation schemas for Flame Connect Cloud API responses
 * Provides runtime type validation and better error handling
 */

import { z } from 'zod';

// Token Set Schema
export const TokenSetSchema = z.object({
    access_token: z.string(),
    refresh_token: z.string().optional(),
    token_type: z.string(),
    expires_in: z.number().optional(),
    expires_at: z.number().optional(),
    scope: z.string().optional(),
});

// Error body of the B2C token endpoint
export const TokenErrorSchema = z.object({
    error: z.string(),
    error_description: z.string().optional(),
});

// Entry of GET /api/Fires/GetFires
export const FireSchema = z.object({
    FireId: z.string(),
    FriendlyName: z.string(),
    Brand: z.string(),
    ProductType: z.string(),
    ProductModel: z.string(),
    ItemCode: z.string(),
    IoTConnectionState: z.number().int(),
    WithHeat: z.boolean(),
    IsIotFire: z.boolean(),
}).passthrough(); // Allow additional properties

export const FireListSchema = z.array(FireSchema);

// Base64 parameter inside the JSON envelope
export const WireParameterSchema = z.object({
    ParameterId: z.number().int(),
    Value: z.string(),
}).passthrough();

// GET /api/Fires/GetFireOverview
export const FireOverviewResponseSchema = z.object({
    WifiFireOverview: z.object({
        FireId: z.string(),
        FriendlyName: z.string().optional(),
        Brand: z.string().optional(),
        ProductType: z.string().optional(),
        ProductModel: z.string().optional(),
        ItemCode: z.string().optional(),
        IoTConnectionState: z.number().int().optional(),
        WithHeat: z.boolean().optional(),
        IsIotFire: z.boolean().optional(),
        Parameters: z.array(WireParameterSchema).default([]),
    }).passthrough(),
}).passthrough();

export type FireResponse = z.infer<typeof FireSchema>;
export type FireOverviewResponse = z.infer<typeof FireOverviewResponseSchema>;

// Plugin configuration as entered in config.json
export const PluginConfigSchema = z.object({
    platform: z.string(),
    name: z.string().optional(),
    email: z.string().email(),
    password: z.string().min(1),
    updateIntervalInMinutes: z.number().min(1).max(60).optional(),
    forceUpdateDelay: z.number().min(1000).max(300000).optional(),
    excludedFiresByFireId: z.array(z.string()).optional(),
    showExtraFeatures: z.boolean().optional(),
    showPulsatingEffect: z.boolean().optional(),
    showMediaLight: z.boolean().optional(),
    showOverheadLight: z.boolean().optional(),
    showBoostMode: z.boolean().optional(),
    showTimer: z.boolean().optional(),
    timerDurationMinutes: z.number().int().min(1).max(1440).optional(),
}).passthrough();

// Helper function to validate and parse data
export function validateData<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context?: string): T {
    try {
        return schema.parse(data);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const errorMessages = error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
            throw new Error(`Validation failed${context ? ` for ${context}` : ''}: ${errorMessages}`);
        }
        throw error;
    }
}

// Helper function to safely validate without throwing
export function safeValidateData<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): { success: true; data: T } | { success: false; error: string } {
    const result = schema.safeParse(data);
    if (result.success) {
        return { success: true, data: result.data };
    }
    const errorMessages = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
    return { success: false, error: errorMessages };
}
