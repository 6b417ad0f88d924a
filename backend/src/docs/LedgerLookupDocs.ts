export default `# Ledger Event Lookup

Find indexed audit events of a multi-token ledger.

## Query

All fields are optional:

- \`collection\`: collection id
- \`tokenId\`: token id as 32 hex digits (location in the first 16, item in the last 16)
- \`address\`: events where the address is the sender or the recipient
- \`type\`: \`Mint\`, \`Burn\` or \`Transfer\`
- \`limit\` (default 50, at most 1000), \`skip\`, \`sortOrder\` (\`desc\` by default, newest first)

## Results

Each result carries \`txDigest\`, \`eventIndex\`, \`type\`, \`collection\`, \`tokenId\`,
\`from\` and/or \`to\`, and \`amount\` as a decimal string.

## Supply

The total supply of a token is the sum of its indexed mints minus its indexed
burns, replayed in index order. It agrees with the ledger's own supply lookup
for every token whose events were all indexed.`
