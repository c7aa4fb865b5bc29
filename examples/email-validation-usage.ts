/**
 * Example usage of the addr-spec validation API
 */

import {
  EmailAddress,
  describeError,
  isValid,
  isValidDomain,
  isValidLocalPart,
  toDisplay,
  toUri,
  validate,
} from '../src/index.js';

// Example 1: Yes/no validation
console.log('\n=== Basic Validation ===');
const candidates = [
  'user@example.com', // Valid
  'Abc.example.com', // Invalid - no @
  '"Abc@def"@example.com', // Valid - @ inside quotes
  'user..name@example.com', // Invalid - consecutive dots
  'admin@mailserver1', // Valid - dotless domain
  '用户@例子.广告', // Valid - internationalized
];

candidates.forEach((candidate) => {
  console.log(`${candidate}: ${isValid(candidate) ? '✓ Valid' : '✗ Invalid'}`);
});

// Example 2: Finding out why an address was rejected
console.log('\n=== Error Reporting ===');
['@example.com', 'simon@', `${'a'.repeat(65)}@example.com`].forEach((candidate) => {
  const result = validate(candidate);
  if (!result.ok) {
    console.log(`${candidate}: ${result.error} - ${describeError(result.error)}`);
  }
});

// Example 3: Working with the parsed value
console.log('\n=== Parsed Addresses ===');
const parsed = validate('<jsmith@[IPv6:2001:db8::1]>');
if (parsed.ok) {
  const address = parsed.value;
  console.log(`local:   ${address.local}`);
  console.log(`domain:  ${address.domain}`);
  console.log(`string:  ${address}`);
  console.log(`uri:     ${toUri(address)}`);
  console.log(`display: ${toDisplay(address, 'J. Smith')}`);
}

// Example 4: Validating parts on their own
console.log('\n=== Partial Validation ===');
console.log(`"much more" as local-part: ${isValidLocalPart('"much more"')}`);
console.log(`example..com as domain:    ${isValidDomain('example..com')}`);

// Example 5: The throwing form and JSON
console.log('\n=== Throwing Parse and JSON ===');
try {
  EmailAddress.parse('not-an-address');
} catch (error) {
  console.log(`parse failed: ${error instanceof Error ? error.message : String(error)}`);
}
const roundTripped = EmailAddress.fromJSON(JSON.parse(JSON.stringify(EmailAddress.parse('a@b.example'))));
console.log(`revived from JSON: ${roundTripped}`);
