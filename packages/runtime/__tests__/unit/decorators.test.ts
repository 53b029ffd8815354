import { describe, it, expect } from '@jest/globals';
import { Described, Label, Meta } from '../../src/index';

@Described()
class Account {
	@Meta({ override_name: 'Primary ID', order: '1' })
	id = 7;

	@Meta('override_name="name", order="0"')
	username = 'test-user';

	@Meta()
	org = 'acme';
}

class Legacy {
	@Label('Display name')
	name = 'legacy';
}

@Described()
class Point {
	constructor(
		@Meta('unit="px"') public x: number,
		@Label('Vertical') readonly y: number
	) {}
}

describe('decorator markers', () => {
	it('should leave decorated classes and their fields untouched', () => {
		const account = new Account();

		expect(account.id).toBe(7);
		expect(account.username).toBe('test-user');
		expect(account.org).toBe('acme');
		expect(Object.keys(account)).toEqual(['id', 'username', 'org']);
		expect(new Legacy().name).toBe('legacy');
	});

	it('should leave constructor parameter properties untouched', () => {
		const point = new Point(3, 4);

		expect(point.x).toBe(3);
		expect(point.y).toBe(4);
		expect(Object.keys(point)).toEqual(['x', 'y']);
	});

	it('should return the constructor it was given', () => {
		class Plain {}

		expect(Described()(Plain)).toBe(Plain);
	});

	it('should record nothing on the prototype', () => {
		expect(Object.getOwnPropertyNames(Account.prototype)).toEqual(['constructor']);
	});
});
