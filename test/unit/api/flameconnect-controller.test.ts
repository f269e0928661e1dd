import {
  FlameConnectController,
  overviewToFire,
  toConnectionState,
} from '../../../src/api/flameconnect-controller';
import type { SkippedParameter } from '../../../src/api/flameconnect-types';
import { ConnectionState, FireMode, ParameterKind } from '../../../src/types/flameconnect-enums';
import { createMockOAuth, jsonResponse, queueTransport } from '../../helpers/test-isolation';

const fireListEntry = {
  FireId: 'fire-0001',
  FriendlyName: 'Lounge',
  Brand: 'Dimplex',
  ProductType: 'Optimyst',
  ProductModel: 'CAS400',
  ItemCode: 'ITEM-1',
  IoTConnectionState: 2,
  WithHeat: true,
  IsIotFire: true,
};

function base64(...bytes: number[]): string {
  return Buffer.from(bytes).toString('base64');
}

const STANDBY_FRAME = base64(0x41, 0x01, 0x03, 0, 21, 0);

function overviewResponse(parameters: Array<{ ParameterId: number; Value: string }>) {
  return jsonResponse(200, { WifiFireOverview: { FireId: 'fire-0001', Parameters: parameters } });
}

function createController(...responses: Parameters<typeof queueTransport>) {
  const { transport, requests } = queueTransport(...responses);
  const oauth = createMockOAuth();
  const controller = new FlameConnectController(
    { tokenFilePath: '/tmp/unused' },
    { oauth, transport, sleep: async () => undefined },
  );
  return { controller, requests, oauth };
}

describe('FlameConnectController', () => {
  describe('constructor', () => {
    it('should require credentials without a token provider', () => {
      expect(() => new FlameConnectController({ tokenFilePath: '/tmp/unused' }))
        .toThrow('Email and password are required to sign in to Flame Connect');
    });

    it('should refuse credential sign-in with an external token provider', async () => {
      const { controller } = createController();
      await expect(controller.authenticate())
        .rejects.toThrow('Credential sign-in is not available with an external token provider');
    });
  });

  describe('mapping helpers', () => {
    it('should map unknown connection states to UNKNOWN', () => {
      expect(toConnectionState(2)).toBe(ConnectionState.CONNECTED);
      expect(toConnectionState(9)).toBe(ConnectionState.UNKNOWN);
      expect(toConnectionState(undefined)).toBe(ConnectionState.UNKNOWN);
    });

    it('should fall back to the fire id as name', () => {
      const fire = overviewToFire({ WifiFireOverview: { FireId: 'fire-0002', Parameters: [] } });
      expect(fire).toEqual({
        fireId: 'fire-0002',
        friendlyName: 'fire-0002',
        brand: '',
        productType: '',
        productModel: '',
        itemCode: '',
        connectionState: ConnectionState.UNKNOWN,
        withHeat: false,
        isIotFire: false,
      });
    });
  });

  describe('getFires', () => {
    it('should map the fire list', async () => {
      const { controller } = createController(jsonResponse(200, [fireListEntry]));

      const fires = await controller.getFires();

      expect(fires).toEqual([{
        fireId: 'fire-0001',
        friendlyName: 'Lounge',
        brand: 'Dimplex',
        productType: 'Optimyst',
        productModel: 'CAS400',
        itemCode: 'ITEM-1',
        connectionState: ConnectionState.CONNECTED,
        withHeat: true,
        isIotFire: true,
      }]);
    });
  });

  describe('getFireOverview', () => {
    it('should decode parameters and report skipped ones', async () => {
      const { controller } = createController(overviewResponse([
        { ParameterId: 321, Value: STANDBY_FRAME },
        { ParameterId: 999, Value: base64(0) },
      ]));
      const skipped: SkippedParameter[] = [];
      controller.on('parameter_skipped', (entry: SkippedParameter) => skipped.push(entry));

      const overview = await controller.getFireOverview('fire-0001');

      expect(overview.parameters).toEqual([
        { kind: ParameterKind.MODE, mode: FireMode.STANDBY, targetTemperature: 21 },
      ]);
      expect(skipped).toEqual([{ fireId: 'fire-0001', parameterId: 999, reason: 'Unknown parameter ID: 999' }]);
    });
  });

  describe('writeParameters', () => {
    it('should post the encoded envelope', async () => {
      const { controller, requests } = createController(jsonResponse(200, undefined));

      await controller.writeParameters('fire-0001', [
        { kind: ParameterKind.MODE, mode: FireMode.MANUAL, targetTemperature: 22.5 },
      ]);

      expect(JSON.parse(requests[0].body ?? '')).toEqual({
        FireId: 'fire-0001',
        Parameters: [{ ParameterId: 321, Value: base64(0x41, 0x01, 0x03, 1, 22, 5) }],
      });
    });

    it('should not send read-only parameters', async () => {
      const { controller, requests } = createController();

      await expect(controller.writeParameters('fire-0001', [
        { kind: ParameterKind.ERROR, errorByte1: 0, errorByte2: 0, errorByte3: 0, errorByte4: 0 },
      ])).rejects.toThrow('Error parameter is read-only and cannot be encoded');
      expect(requests).toHaveLength(0);
    });
  });

  describe('turnOn / turnOff', () => {
    it('should read the current temperature before switching on', async () => {
      const { controller, requests } = createController(
        overviewResponse([{ ParameterId: 321, Value: STANDBY_FRAME }]),
        jsonResponse(200, undefined),
      );

      await controller.turnOn('fire-0001');

      expect(JSON.parse(requests[1].body ?? '')).toEqual({
        FireId: 'fire-0001',
        Parameters: [{ ParameterId: 321, Value: base64(0x41, 0x01, 0x03, 1, 21, 0) }],
      });
    });

    it('should switch to standby', async () => {
      const { controller, requests } = createController(
        overviewResponse([{ ParameterId: 321, Value: base64(0x41, 0x01, 0x03, 1, 23, 0) }]),
        jsonResponse(200, undefined),
      );

      await controller.turnOff('fire-0001');

      expect(JSON.parse(requests[1].body ?? '')).toEqual({
        FireId: 'fire-0001',
        Parameters: [{ ParameterId: 321, Value: base64(0x41, 0x01, 0x03, 0, 23, 0) }],
      });
    });
  });

  describe('getCloudFires', () => {
    it('should fail when not authenticated', async () => {
      const { controller, oauth } = createController();
      oauth.isAuthenticated.mockReturnValue(false);

      await expect(controller.getCloudFires()).rejects.toThrow('Not authenticated. Please authenticate first.');
    });

    it('should merge list identity with overview parameters', async () => {
      const { controller } = createController(
        jsonResponse(200, [fireListEntry]),
        overviewResponse([{ ParameterId: 321, Value: STANDBY_FRAME }]),
      );

      const [fire] = await controller.getCloudFires();

      expect(fire.getName()).toBe('Lounge');
      expect(fire.getFire().withHeat).toBe(true);
      expect(fire.getParameter(ParameterKind.MODE)?.targetTemperature).toBe(21);
    });

    it('should reuse fire instances across updates', async () => {
      const { controller } = createController(
        jsonResponse(200, [fireListEntry]),
        overviewResponse([{ ParameterId: 321, Value: STANDBY_FRAME }]),
        jsonResponse(200, [fireListEntry]),
        overviewResponse([{ ParameterId: 321, Value: base64(0x41, 0x01, 0x03, 1, 21, 0) }]),
      );

      const [first] = await controller.getCloudFires();
      const updated = vi.fn();
      first.on('updated', updated);
      const [second] = await controller.getCloudFires();

      expect(second).toBe(first);
      expect(first.isOn()).toBe(true);
      expect(updated).toHaveBeenCalledTimes(1);
    });

    it('should refresh known fires on update', async () => {
      const { controller, requests } = createController(
        jsonResponse(200, [fireListEntry]),
        overviewResponse([{ ParameterId: 321, Value: STANDBY_FRAME }]),
      );

      await controller.updateAllFireData();

      expect(requests.map(r => r.url)).toEqual([
        'https://mobileapi.gdhv-iot.com/api/Fires/GetFires',
        'https://mobileapi.gdhv-iot.com/api/Fires/GetFireOverview?FireId=fire-0001',
      ]);
    });

    it('should write through the controller from a fire', async () => {
      const { controller, requests } = createController(
        jsonResponse(200, [fireListEntry]),
        overviewResponse([{ ParameterId: 321, Value: STANDBY_FRAME }]),
        jsonResponse(200, undefined),
      );

      const [fire] = await controller.getCloudFires();
      await fire.turnOff();

      expect(requests[2].url).toBe('https://mobileapi.gdhv-iot.com/api/Fires/WriteWifiParameters');
    });
  });

  describe('rate limiting', () => {
    it('should expose the API rate limit state', async () => {
      const { controller } = createController(jsonResponse(429, {}, { 'retry-after': '30' }));

      await expect(controller.getFires()).rejects.toThrow('Rate limited. Retry after 30 seconds.');
      expect(controller.isRateLimited()).toBe(true);
      expect(controller.getRateLimitRetryAfter()).toBeGreaterThan(0);
    });
  });
});
