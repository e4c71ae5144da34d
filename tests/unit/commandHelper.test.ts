/**
 * Unit tests for command argument parsing
 */

import { getCommandArgs, parseSettingArgs, resolveTarget } from '../../src/utils/commandHelper';
import { createContext, stickerUpdate, textUpdate } from '../helpers/mockContext';

describe('Command helpers', () => {
	describe('getCommandArgs', () => {
		it('should split arguments on any whitespace', () => {
			expect(getCommandArgs(createContext(textUpdate('/setlimit  text\tthreshold 5')))).toEqual([
				'text',
				'threshold',
				'5',
			]);
		});

		it('should return nothing for a message without text', () => {
			expect(getCommandArgs(createContext(stickerUpdate()))).toEqual([]);
		});
	});

	describe('resolveTarget', () => {
		it('should prefer the author of the replied message', () => {
			expect(resolveTarget(createContext(textUpdate('/pardon 42', { replyToUserId: 777 })))).toBe(777);
		});

		it('should accept a numeric user ID argument', () => {
			expect(resolveTarget(createContext(textUpdate('/pardon 42')))).toBe(42);
		});

		it('should not target the topic starter inside a forum topic', () => {
			expect(resolveTarget(createContext(textUpdate('/pardon 42', { inTopic: true })))).toBe(42);
			expect(resolveTarget(createContext(textUpdate('/pardon', { inTopic: true })))).toBeNull();
		});

		it('should still follow real replies inside a forum topic', () => {
			expect(resolveTarget(createContext(textUpdate('/pardon', { inTopic: true, replyToUserId: 777 })))).toBe(777);
		});

		it('should return null without a reply or a numeric argument', () => {
			expect(resolveTarget(createContext(textUpdate('/pardon @alice')))).toBeNull();
			expect(resolveTarget(createContext(textUpdate('/pardon')))).toBeNull();
		});
	});

	describe('parseSettingArgs', () => {
		it('should parse a threshold change', () => {
			expect(parseSettingArgs(['text', 'threshold', '5'])).toEqual({
				ok: true,
				setting: { category: 'text', field: 'threshold', value: 5 },
			});
		});

		it('should accept field aliases in any case', () => {
			expect(parseSettingArgs(['Photo', 'WINDOW', '45'])).toEqual({
				ok: true,
				setting: { category: 'photo', field: 'windowSeconds', value: 45 },
			});
			expect(parseSettingArgs(['sticker', 'limit', '4'])).toEqual({
				ok: true,
				setting: { category: 'sticker', field: 'threshold', value: 4 },
			});
		});

		it('should leave range checks to the policy store', () => {
			expect(parseSettingArgs(['video', 'threshold', '-3'])).toEqual({
				ok: true,
				setting: { category: 'video', field: 'threshold', value: -3 },
			});
		});

		it('should reject missing arguments', () => {
			expect(parseSettingArgs(['text', 'threshold'])).toEqual({
				ok: false,
				error: 'Expected a category, a field and a value',
			});
		});

		it('should reject unknown categories and fields', () => {
			expect(parseSettingArgs(['voice', 'threshold', '5'])).toEqual({ ok: false, error: 'Unknown category: voice' });
			expect(parseSettingArgs(['text', 'cooldown', '5'])).toEqual({ ok: false, error: 'Unknown field: cooldown' });
			expect(parseSettingArgs(['text', 'constructor', '5'])).toEqual({
				ok: false,
				error: 'Unknown field: constructor',
			});
		});

		it('should reject values that are not whole numbers', () => {
			expect(parseSettingArgs(['text', 'threshold', '2.5'])).toEqual({ ok: false, error: 'Not a whole number: 2.5' });
		});
	});
});
