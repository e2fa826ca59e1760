import assert from "node:assert";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import * as validators from "../src/validators.js";
import { validate } from "../src/validators.js";

describe("validate", () => {
	it("should report the first rejection in order", () => {
		const checks = [validators.strLength(2), validators.prefix("a"), validators.suffix("z")];
		assert.strictEqual(validate("b", checks), "too short, minimum is 2");
		assert.strictEqual(validate("bz", checks), "expected prefix 'a'");
		assert.strictEqual(validate("ab", checks), "expected suffix 'z'");
		assert.strictEqual(validate("abz", checks), undefined);
		assert.strictEqual(validate("anything", []), undefined);
	});
});

describe("string validators", () => {
	it("should count length in code points", () => {
		const check = validators.strLength(2, 4);
		assert.strictEqual(check("a"), "too short, minimum is 2");
		assert.strictEqual(check("abcde"), "too long, maximum is 4");
		assert.strictEqual(check("\u{1F600}\u{1F600}"), undefined);
		assert.strictEqual(validators.strLength(0)("x".repeat(1000)), undefined);
	});

	it("should give the same answer for a global pattern on every call", () => {
		const check = validators.pattern(/a/g, "no a");
		assert.strictEqual(check("cat"), undefined);
		assert.strictEqual(check("cat"), undefined);
		assert.strictEqual(check("dog"), "no a");
	});

	it("should skip the wrapped validator for empty input", () => {
		const check = validators.emptyOr(validators.strLength(3));
		assert.strictEqual(check(""), undefined);
		assert.strictEqual(check("ab"), "too short, minimum is 3");
	});

	it("should check e-mail addresses", () => {
		const check = validators.emailAddress();
		assert.strictEqual(check("first.last@mail.example.com"), undefined);
		assert.strictEqual(check("user@localhost"), "invalid e-mail address");
		assert.strictEqual(check("no-at-sign.example.com"), "invalid e-mail address");
	});

	it("should check IP addresses", () => {
		assert.strictEqual(validators.ipv4Address()("192.168.0.1"), undefined);
		assert.strictEqual(validators.ipv4Address()("1.2.3"), "invalid IPv4 address");
		assert.strictEqual(validators.ipv6Address()("fe80::1"), undefined);
		assert.strictEqual(validators.ipv6Address()("::1"), undefined);
		assert.strictEqual(validators.ipv6Address()("g::1"), "invalid IPv6 address");
		assert.strictEqual(validators.ipAddress()("10.0.0.1"), undefined);
		assert.strictEqual(validators.ipAddress()("fe80::1"), undefined);
		assert.strictEqual(validators.ipAddress()("localhost"), "invalid IP address");
	});

	it("should check path syntax", () => {
		assert.strictEqual(validators.path()("a/b"), undefined);
		assert.strictEqual(validators.path()("/a/b/"), undefined);
		assert.strictEqual(validators.path()("a//b"), "invalid path");
		assert.strictEqual(validators.absolutePath()("/usr/local/bin"), undefined);
		assert.strictEqual(validators.absolutePath()("usr/local"), "invalid absolute path");
	});

	it("should check user names", () => {
		const check = validators.userName();
		assert.strictEqual(check("alice"), undefined);
		assert.strictEqual(check("backup$"), undefined);
		assert.strictEqual(check("Alice"), "invalid user name");
		assert.strictEqual(check("a"), "invalid user name");
	});

	it("should check domain names", () => {
		assert.strictEqual(validators.topDomainName()("example.com"), undefined);
		assert.strictEqual(validators.topDomainName()("www.example.com"), "invalid top-level domain name");
		assert.strictEqual(validators.domainName()("www.example.com"), undefined);
		assert.strictEqual(validators.domainName()("example"), "invalid domain name");
		assert.strictEqual(validators.fqdn()("example.com."), undefined);
		assert.strictEqual(validators.fqdn()("example.com"), "invalid fully qualified domain name");
	});

	describe("filesystem", () => {
		let tempDir: string;
		let tempFile: string;

		beforeEach(() => {
			tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "termprompt-validators-"));
			tempFile = path.join(tempDir, "notes.txt");
			fs.writeFileSync(tempFile, "test");
		});

		afterEach(() => {
			fs.rmSync(tempDir, { recursive: true, force: true });
		});

		it("should require an existing directory", () => {
			const check = validators.dir();
			const missing = path.join(tempDir, "missing");
			assert.strictEqual(check(tempDir), undefined);
			assert.strictEqual(check(tempFile), `path is not a directory: ${tempFile}`);
			assert.strictEqual(check(missing), `file not found: ${missing}`);
		});

		it("should require an existing regular file", () => {
			const check = validators.file();
			const below = path.join(tempFile, "below");
			assert.strictEqual(check(tempFile), undefined);
			assert.strictEqual(check(tempDir), `path is not a regular file: ${tempDir}`);
			assert.strictEqual(check(below), `file not found: ${below}`);
		});
	});
});

describe("number and date validators", () => {
	it("should check inclusive ranges", () => {
		const check = validators.numRange(1, 10);
		assert.strictEqual(check(1), undefined);
		assert.strictEqual(check(10), undefined);
		assert.strictEqual(check(0), "out of range [1,10]");
		assert.strictEqual(check(11), "out of range [1,10]");
	});

	it("should leave a NaN limit open", () => {
		assert.strictEqual(validators.numRange(Number.NaN, 10)(-1000), undefined);
		assert.strictEqual(validators.numRange(0, Number.NaN)(1e300), undefined);
	});

	it("should check port numbers", () => {
		assert.strictEqual(validators.port()(8080), undefined);
		assert.strictEqual(validators.port()(0), "out of range [1,65535]");
		assert.strictEqual(validators.port()(65536), "out of range [1,65535]");
	});

	it("should check date ranges", () => {
		const min = new Date(Date.UTC(2024, 0, 1));
		const max = new Date(Date.UTC(2024, 11, 31));
		const check = validators.dateRange(min, max);
		assert.strictEqual(check(new Date(Date.UTC(2024, 5, 1))), undefined);
		assert.strictEqual(
			check(new Date(Date.UTC(2025, 0, 1))),
			"out of range [2024-01-01T00:00:00.000Z,2024-12-31T00:00:00.000Z]",
		);
		assert.strictEqual(validators.dateRange(undefined, max)(new Date(0)), undefined);
	});

	it("should compare strictly for before and after", () => {
		assert.strictEqual(validators.before(10)(9), undefined);
		assert.strictEqual(validators.before(10)(10), "must be before 10");
		assert.strictEqual(validators.after(10)(11), undefined);
		assert.strictEqual(validators.after(10)(10), "must be after 10");
		const limit = new Date(Date.UTC(2024, 0, 1));
		assert.strictEqual(validators.after(limit)(new Date(0)), "must be after 2024-01-01T00:00:00.000Z");
	});
});

describe("combinators", () => {
	it("should compare values for equality", () => {
		assert.strictEqual(validators.is("a")("a"), undefined);
		assert.strictEqual(validators.is("a")("b"), "expected 'a'");
	});

	it("should check list membership, dates by value", () => {
		assert.strictEqual(validators.oneOf([1, 2])(2), undefined);
		assert.strictEqual(validators.oneOf([1, 2])(3), "not available");
		assert.strictEqual(validators.oneOf([new Date(0)])(new Date(0)), undefined);
		assert.strictEqual(validators.notIn(["root"])("root"), "not available");
		assert.strictEqual(validators.notIn(["root"])("alice"), undefined);
	});

	it("should invert a validator", () => {
		const check = validators.not(validators.prefix("x"));
		assert.strictEqual(check("xy"), "not available");
		assert.strictEqual(check("ab"), undefined);
	});

	it("should combine validators", () => {
		const all = validators.and(validators.strLength(2), validators.prefix("a"));
		assert.strictEqual(all("b"), "too short, minimum is 2");
		assert.strictEqual(all("bc"), "expected prefix 'a'");
		assert.strictEqual(all("ab"), undefined);

		const any = validators.or(validators.prefix("a"), validators.prefix("b"));
		assert.strictEqual(any("bc"), undefined);
		assert.strictEqual(any("c"), "not available");
		assert.strictEqual(validators.or<string>()("c"), undefined);
	});
});
