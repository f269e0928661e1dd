/**
 * Flame Connect Cloud Controller
 *
 * Main controller that ties together OAuth, the REST API, the parameter
 * envelope and fire management.
 */

import { EventEmitter } from 'node:events';
import type {
  Fire,
  FireOverview,
  FlameConnectControllerConfig,
  OAuthProvider,
  SkippedParameter,
  TokenTrackingProvider,
  TokenSet,
} from './flameconnect-types';
import type { FireOverviewResponse, FireResponse } from './flameconnect-schemas';
import { FlameConnectOAuth } from './flameconnect-oauth';
import { FlameConnectApi } from './flameconnect-api';
import { FlameConnectFire } from './flameconnect-fire';
import type { HttpTransport } from './https-client';
import { buildWriteRequest, decodeWireParameters } from './parameter-envelope';
import { turnOffParameters, turnOnParameters } from './fire-commands';
import type { Parameter } from '../protocol';
import { ConnectionState } from '../types/flameconnect-enums';

export interface FlameConnectControllerOptions {
  /** Token source to use instead of the credential sign-in */
  oauth?: OAuthProvider;
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
}

export function toConnectionState(value: number | undefined): ConnectionState {
  switch (value) {
    case ConnectionState.NOT_CONNECTED:
    case ConnectionState.CONNECTED:
    case ConnectionState.UPDATING_FIRMWARE:
      return value;
    default:
      return ConnectionState.UNKNOWN;
  }
}

export function toFire(response: FireResponse): Fire {
  return {
    fireId: response.FireId,
    friendlyName: response.FriendlyName,
    brand: response.Brand,
    productType: response.ProductType,
    productModel: response.ProductModel,
    itemCode: response.ItemCode,
    connectionState: toConnectionState(response.IoTConnectionState),
    withHeat: response.WithHeat,
    isIotFire: response.IsIotFire,
  };
}

/**
 * Fire identity from an overview; fields the cloud omits get neutral defaults
 */
export function overviewToFire(response: FireOverviewResponse): Fire {
  const overview = response.WifiFireOverview;
  return {
    fireId: overview.FireId,
    friendlyName: overview.FriendlyName || overview.FireId,
    brand: overview.Brand ?? '',
    productType: overview.ProductType ?? '',
    productModel: overview.ProductModel ?? '',
    itemCode: overview.ItemCode ?? '',
    connectionState: toConnectionState(overview.IoTConnectionState),
    withHeat: overview.WithHeat ?? false,
    isIotFire: overview.IsIotFire ?? false,
  };
}

export class FlameConnectController extends EventEmitter {
  private readonly oauth: OAuthProvider;
  private readonly credentialOAuth?: FlameConnectOAuth;
  private readonly api: FlameConnectApi;
  private fires: FlameConnectFire[] = [];

  constructor(config: FlameConnectControllerConfig, options: FlameConnectControllerOptions = {}) {
    super();

    if (options.oauth) {
      this.oauth = options.oauth;
    } else {
      if (!config.email || !config.password) {
        throw new Error('Email and password are required to sign in to Flame Connect');
      }
      this.credentialOAuth = new FlameConnectOAuth(
        { email: config.email, password: config.password, tokenFilePath: config.tokenFilePath },
        (tokenSet) => this.emit('token_update', tokenSet),
        (error) => this.emit('error', error.message),
        options.transport,
      );
      this.oauth = this.credentialOAuth;
    }

    this.api = new FlameConnectApi(this.oauth, options.transport, options.sleep);
  }

  /**
     * Sign in with the configured credentials
     */
  async authenticate(): Promise<TokenSet> {
    if (!this.credentialOAuth) {
      throw new Error('Credential sign-in is not available with an external token provider');
    }
    return this.credentialOAuth.authenticate();
  }

  /**
     * Check if authenticated
     */
  isAuthenticated(): boolean {
    return this.oauth.isAuthenticated();
  }

  /**
     * Get token expiration date
     */
  getTokenExpiration(): Date | null {
    return this.tokenTracker()?.getTokenExpiration() ?? null;
  }

  /**
     * Forget stored tokens
     */
  clearTokens(): void {
    this.credentialOAuth?.clearTokens();
  }

  /**
     * List the fires registered to the account
     */
  async getFires(): Promise<Fire[]> {
    const responses = await this.api.getFires();
    return responses.map(toFire);
  }

  /**
     * Fetch a fire and decode its parameters.
     * Parameters that fail to decode are skipped and reported.
     */
  async getFireOverview(fireId: string): Promise<FireOverview> {
    const response = await this.api.getFireOverview(fireId);
    const fire = overviewToFire(response);
    const parameters = decodeWireParameters(
      response.WifiFireOverview.Parameters,
      (entry, error) => {
        const skipped: SkippedParameter = {
          fireId: fire.fireId,
          parameterId: entry.ParameterId,
          reason: error.message,
        };
        this.emit('parameter_skipped', skipped);
      },
    );
    return { fire, parameters };
  }

  /**
     * Encode and write parameters to a fire
     */
  async writeParameters(fireId: string, params: readonly Parameter[]): Promise<void> {
    const request = buildWriteRequest(fireId, params);
    if (!request.success) {
      throw request.error;
    }
    await this.api.writeWifiParameters(request.data);
  }

  /**
     * Switch a fire to manual mode at its current temperature
     */
  async turnOn(fireId: string): Promise<void> {
    const overview = await this.getFireOverview(fireId);
    await this.writeParameters(fireId, turnOnParameters(overview.parameters));
  }

  async turnOff(fireId: string): Promise<void> {
    const overview = await this.getFireOverview(fireId);
    await this.writeParameters(fireId, turnOffParameters(overview.parameters));
  }

  /**
     * Get all fires with their current state, reusing known instances
     */
  async getCloudFires(): Promise<FlameConnectFire[]> {
    if (!this.oauth.isAuthenticated()) {
      throw new Error('Not authenticated. Please authenticate first.');
    }

    const fires = await this.getFires();
    const updated: FlameConnectFire[] = [];
    for (const fire of fires) {
      const overview = await this.getFireOverview(fire.fireId);
      // The list carries the richer identity
      const merged: FireOverview = { fire: { ...overview.fire, ...fire }, parameters: overview.parameters };

      const existing = this.fires.find(f => f.getId() === fire.fireId);
      if (existing) {
        existing.updateOverview(merged);
        updated.push(existing);
      } else {
        updated.push(new FlameConnectFire(merged, this));
      }
    }

    this.fires = updated;
    return this.fires;
  }

  /**
     * Update all fire data from the cloud
     */
  async updateAllFireData(): Promise<void> {
    await this.getCloudFires();
  }

  /**
     * Check if rate limited
     */
  isRateLimited(): boolean {
    return this.api.isRateLimited();
  }

  /**
     * Get rate limit retry time
     */
  getRateLimitRetryAfter(): number {
    return this.api.getRateLimitRetryAfter();
  }

  private tokenTracker(): TokenTrackingProvider | undefined {
    if (this.credentialOAuth) {
      return this.credentialOAuth;
    }
    return isTokenTracking(this.oauth) ? this.oauth : undefined;
  }
}

function isTokenTracking(provider: OAuthProvider): provider is TokenTrackingProvider {
  return 'getTokenExpiration' in provider && typeof provider.getTokenExpiration === 'function';
}
