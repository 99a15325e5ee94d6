import os from 'node:os';
import path from 'node:path';
import { expect } from 'chai';
import { errorMessage, expandHome, parsePositiveInt, roundNumber } from '../../../src/lib/util.js';

describe('util', () => {
	describe('roundNumber', () => {
		it('should keep more decimals for small values', () => {
			expect(roundNumber(1.23456)).to.equal(1.235);
			expect(roundNumber(12.3456)).to.equal(12.35);
			expect(roundNumber(123.456)).to.equal(123.5);
			expect(roundNumber(1234.56)).to.equal(1235);
			expect(roundNumber(12345.6)).to.equal(12346);
		});
	});

	describe('parsePositiveInt', () => {
		it('should parse positive integers', () => {
			expect(parsePositiveInt('35')).to.equal(35);
			expect(parsePositiveInt(' 8 ')).to.equal(8);
		});

		it('should reject everything else', () => {
			expect(parsePositiveInt(undefined)).to.be.undefined;
			expect(parsePositiveInt('0')).to.be.undefined;
			expect(parsePositiveInt('-3')).to.be.undefined;
			expect(parsePositiveInt('1.5')).to.be.undefined;
			expect(parsePositiveInt('ten')).to.be.undefined;
		});
	});

	describe('expandHome', () => {
		it('should expand a leading tilde', () => {
			expect(expandHome('~/.iptest/client_config.json')).to.equal(path.join(os.homedir(), '.iptest/client_config.json'));
		});

		it('should leave other paths alone', () => {
			expect(expandHome('/etc/iptest.json')).to.equal('/etc/iptest.json');
		});
	});

	describe('errorMessage', () => {
		it('should read error messages and stringify the rest', () => {
			expect(errorMessage(new Error('boom'))).to.equal('boom');
			expect(errorMessage('plain')).to.equal('plain');
		});
	});
});
