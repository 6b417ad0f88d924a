export default `# Ledger Event Admission

The index accepts the audit events of committed ledger transactions. Each
transaction arrives as an ordered batch of Mint, Burn and Transfer events.

Every event names a collection, a token id (u128) and an amount (u64).
Mint events name the minting sender as \`to\`; Burn events name the burning
owner as \`from\`; Transfer events name both.

## Admission Rules (Enforced)

- **Shape**: the event type is Mint, Burn or Transfer, the collection is set, the token id fits 128 bits and the amount fits 64 bits.
- **Mint**: the amount is positive and the indexed supply of the token must stay within 64 bits.
- **Burn**: the amount may not exceed the indexed supply of the token, counting the earlier admitted events of the same batch.
- **Transfer**: never changes supply; only the shape is checked.
- **Independence**: each token is evaluated on its own; a rejected event does not affect the others in its batch.`
