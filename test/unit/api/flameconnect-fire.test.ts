import {FlameConnectFire, ParameterWriter} from '../../../src/api/flameconnect-fire';
import {Parameter} from '../../../src/protocol';
import {
    FireMode,
    FlameEffectStatus,
    HeatStatus,
    ParameterKind,
    TemperatureUnit,
    TimerStatus,
} from '../../../src/types/flameconnect-enums';
import {createOverview, flameEffect, heatSettings, standbyMode} from '../../helpers/fires';

function createWriter() {
    const writes: Array<{fireId: string; params: readonly Parameter[]}> = [];
    const writer = {
        writeParameters: vi.fn(async (fireId: string, params: readonly Parameter[]) => {
            writes.push({fireId, params});
        }),
    } satisfies ParameterWriter;
    return {writer, writes};
}

describe('FlameConnectFire', () => {
    it('should expose identity and parameters', () => {
        const fire = new FlameConnectFire(createOverview(), createWriter().writer);

        expect(fire.getId()).toBe('fire-0001');
        expect(fire.getName()).toBe('Lounge');
        expect(fire.getParameter(ParameterKind.HEAT_SETTINGS)).toEqual(heatSettings);
        expect(fire.hasParameter(ParameterKind.TIMER)).toBe(false);
        expect(fire.isOn()).toBe(false);
    });

    it('should default the temperature unit to Celsius', () => {
        const fire = new FlameConnectFire(createOverview(), createWriter().writer);
        expect(fire.getTemperatureUnit()).toBe(TemperatureUnit.CELSIUS);
    });

    it('should turn on and apply the written state', async () => {
        const {writer, writes} = createWriter();
        const fire = new FlameConnectFire(createOverview(), writer);
        const updated = vi.fn();
        fire.on('updated', updated);

        await fire.turnOn();

        expect(writes).toEqual([{
            fireId: 'fire-0001',
            params: [
                {...standbyMode, mode: FireMode.MANUAL},
                {...flameEffect, flameEffect: FlameEffectStatus.ON},
            ],
        }]);
        expect(fire.isOn()).toBe(true);
        expect(fire.getParameter(ParameterKind.FLAME_EFFECT)?.flameEffect).toBe(FlameEffectStatus.ON);
        expect(updated).toHaveBeenCalledTimes(1);
    });

    it('should leave the state untouched when the write fails', async () => {
        const {writer} = createWriter();
        writer.writeParameters.mockRejectedValueOnce(new Error('offline'));
        const fire = new FlameConnectFire(createOverview(), writer);

        await expect(fire.turnOn()).rejects.toThrow('offline');
        expect(fire.isOn()).toBe(false);
    });

    it('should write heat settings with only the given change', async () => {
        const {writer, writes} = createWriter();
        const fire = new FlameConnectFire(createOverview(), writer);

        await fire.setHeatSettings({heatStatus: HeatStatus.ON});

        expect(writes[0].params).toEqual([{...heatSettings, heatStatus: HeatStatus.ON}]);
    });

    it('should add a timer parameter it did not have', async () => {
        const fire = new FlameConnectFire(createOverview(), createWriter().writer);

        await fire.setTimer(45);

        expect(fire.getParameter(ParameterKind.TIMER)).toEqual({
            kind: ParameterKind.TIMER,
            timerStatus: TimerStatus.ENABLED,
            duration: 45,
        });
    });

    it('should switch the temperature unit', async () => {
        const fire = new FlameConnectFire(createOverview(), createWriter().writer);

        await fire.setTemperatureUnit(TemperatureUnit.FAHRENHEIT);

        expect(fire.getTemperatureUnit()).toBe(TemperatureUnit.FAHRENHEIT);
    });

    it('should replace everything on a new overview', () => {
        const fire = new FlameConnectFire(createOverview(), createWriter().writer);
        const updated = vi.fn();
        fire.on('updated', updated);

        fire.updateOverview(createOverview({friendlyName: 'Study'}, [{...standbyMode, mode: FireMode.MANUAL}]));

        expect(fire.getName()).toBe('Study');
        expect(fire.getParameters()).toHaveLength(1);
        expect(fire.isOn()).toBe(true);
        expect(updated).toHaveBeenCalledTimes(1);
    });

    it('should serialise only its data', () => {
        const overview = createOverview();
        const fire = new FlameConnectFire(overview, createWriter().writer);

        expect(JSON.parse(JSON.stringify({fire}))).toEqual({fire: overview});
    });
});
