/**
 * Flame Connect Cloud API Types
 */

import {ConnectionState} from '../types/flameconnect-enums';
import type {Parameter} from '../protocol';

export const FLAMECONNECT_API_BASE = 'https://mobileapi.gdhv-iot.com';

const B2C_CLIENT_ID = '1af761dc-085a-411f-9cb9-53e5e2115bd2';

// Azure AD B2C tenant used by the Flame Connect mobile app
export const FLAMECONNECT_B2C_CONFIG = {
    clientId: B2C_CLIENT_ID,
    authority: 'https://gdhvb2cflameconnect.b2clogin.com/gdhvb2cflameconnect.onmicrosoft.com/B2C_1A_FirePhoneSignUpOrSignInWithPhoneOrEmail',
    scopes: ['https://gdhvb2cflameconnect.onmicrosoft.com/Mobile/read'],
    redirectUri: `msal${B2C_CLIENT_ID}://auth`,
};

// Headers the cloud expects from the mobile app
export const FLAMECONNECT_DEFAULT_HEADERS: Record<string, string> = {
    'app_name': 'FlameConnect',
    'api_version': '1.0',
    'app_version': '2.22.0',
    'app_device_os': 'android',
    'device_version': '14',
    'device_manufacturer': 'Homebridge',
    'device_model': 'homebridge-flameconnect',
    'lang_code': 'en',
    'country': 'US',
    'logging_required_flag': 'True',
};

// Token Set
export interface TokenSet {
    access_token: string;
    refresh_token?: string;
    token_type: string;
    expires_in?: number;
    expires_at?: number;
    scope?: string;
}

// A registered fireplace
export interface Fire {
    fireId: string;
    friendlyName: string;
    brand: string;
    productType: string;
    productModel: string;
    itemCode: string;
    connectionState: ConnectionState;
    withHeat: boolean;
    isIotFire: boolean;
}

// Fire identity plus its decoded parameters
export interface FireOverview {
    fire: Fire;
    parameters: Parameter[];
}

// One base64 parameter as carried in the JSON envelope
export interface WireParameter {
    ParameterId: number;
    Value: string;
}

export interface WriteParametersRequest {
    FireId: string;
    Parameters: WireParameter[];
}

// OAuth Provider Interface
export interface OAuthProvider {
    getAccessToken(): Promise<string>;
    isAuthenticated(): boolean;
    refreshToken(): Promise<TokenSet>;
}

// Provider that knows when its token expires
export interface TokenTrackingProvider extends OAuthProvider {
    getTokenExpiration(): Date | null;
}

export interface FlameConnectControllerConfig {
    email?: string;
    password?: string;
    tokenFilePath: string;
}

// Event Types
export type FlameConnectEventType =
    | 'token_update'
    | 'parameter_skipped'
    | 'error';

export interface SkippedParameter {
    fireId: string;
    parameterId: number;
    reason: string;
}
