import * as fs from 'node:fs';
import {loadTokenFromFile, saveTokenToFile, deleteTokenFile} from '../../../src/api/token-storage';
import {TokenSet} from '../../../src/api/flameconnect-types';

vi.mock('node:fs');

describe('Token Storage', () => {
    const filePath = '/tmp/test-token.json';
    const tokenSet: TokenSet = {
        access_token: 'test-access-token',
        refresh_token: 'test-refresh-token',
        token_type: 'Bearer',
        expires_in: 3600,
        expires_at: 1700003600,
    };

    beforeEach(() => {
        vi.resetAllMocks();
    });

    describe('loadTokenFromFile', () => {
        it('should return null if file does not exist', () => {
            vi.mocked(fs.existsSync).mockReturnValue(false);
            expect(loadTokenFromFile(filePath)).toBeNull();
            expect(fs.readFileSync).not.toHaveBeenCalled();
        });

        it('should return parsed token set from file', () => {
            vi.mocked(fs.existsSync).mockReturnValue(true);
            vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify(tokenSet));
            expect(loadTokenFromFile(filePath)).toEqual(tokenSet);
        });

        it('should report invalid JSON and return null', () => {
            vi.mocked(fs.existsSync).mockReturnValue(true);
            vi.mocked(fs.readFileSync).mockReturnValue('not-json{{{');
            const onError = vi.fn();
            expect(loadTokenFromFile(filePath, onError)).toBeNull();
            expect(onError).toHaveBeenCalledTimes(1);
        });

        it('should report an invalid token structure', () => {
            vi.mocked(fs.existsSync).mockReturnValue(true);
            vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({foo: 'bar'}));
            const onError = vi.fn();
            expect(loadTokenFromFile(filePath, onError)).toBeNull();
            expect(onError).toHaveBeenCalledWith(new Error(`Token file ${filePath} has an invalid structure`));
        });

        it('should return null if readFileSync throws', () => {
            vi.mocked(fs.existsSync).mockReturnValue(true);
            vi.mocked(fs.readFileSync).mockImplementation(() => {
                throw new Error('Permission denied');
            });
            const onError = vi.fn();
            expect(loadTokenFromFile(filePath, onError)).toBeNull();
            expect(onError).toHaveBeenCalledWith(new Error('Permission denied'));
        });
    });

    describe('saveTokenToFile', () => {
        it('should write token set with restricted permissions', () => {
            saveTokenToFile(filePath, tokenSet);
            expect(fs.writeFileSync).toHaveBeenCalledWith(
                filePath,
                JSON.stringify(tokenSet, null, 2),
                {encoding: 'utf8', mode: 0o600},
            );
        });
    });

    describe('deleteTokenFile', () => {
        it('should delete file if it exists', () => {
            vi.mocked(fs.existsSync).mockReturnValue(true);
            deleteTokenFile(filePath);
            expect(fs.unlinkSync).toHaveBeenCalledWith(filePath);
        });

        it('should do nothing if file does not exist', () => {
            vi.mocked(fs.existsSync).mockReturnValue(false);
            deleteTokenFile(filePath);
            expect(fs.unlinkSync).not.toHaveBeenCalled();
        });
    });
});
