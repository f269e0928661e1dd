import type {Fire} from './flameconnect-types';

const REDACTED = 'REDACTED';

export class FireRepository {
  /**
   * Copy of a fire safe to put in debug logs: the id keeps its last four characters
   */
  static maskSensitiveFireData(fire: Fire): Fire {
    return {
      ...fire,
      fireId: FireRepository.maskId(fire.fireId),
      itemCode: fire.itemCode ? REDACTED : '',
    };
  }

  static maskId(id: string): string {
    if (id.length <= 4) {
      return REDACTED;
    }
    return `${'*'.repeat(id.length - 4)}${id.slice(-4)}`;
  }
}
