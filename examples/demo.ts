import { Sealpost, bytesToString } from "../src/index";

function quickTest() {
  console.log("🔍 Sealed envelope round trip");
  console.log("=".repeat(50));

  const sealpost = new Sealpost({ logLevel: "warn" });

  console.log("1. Creating identities...");
  const alice = sealpost.generateKeyPair();
  const bob = sealpost.generateKeyPair();
  const eve = sealpost.generateKeyPair();
  console.log("   ✅ Alice, Bob and Eve have key pairs");

  console.log("2. Alice seals a message for Bob...");
  const outgoing = sealpost.outgoing(alice, bob.publicKey);
  outgoing.seal("milady");
  const wire = sealpost.encode(outgoing.dispatch());
  console.log(`   ✅ ${wire.length} bytes on the wire (${outgoing.state})`);

  console.log("3. Bob opens it...");
  const received = sealpost.receive(sealpost.decode(wire), bob.secretKey, {
    expectedSender: alice.publicKey,
  });
  if (received.state === "Decrypted") {
    console.log(`   ✅ "${bytesToString(received.message.plaintext)}"`);
  } else {
    console.log(`   ❌ ${received.error.message}`);
  }

  console.log("4. Eve tries the same envelope...");
  const intercepted = sealpost.receive(sealpost.decode(wire), eve.secretKey);
  if (intercepted.state === "Rejected") {
    console.log(`   ✅ Rejected: ${intercepted.error.code}`);
  } else {
    console.log("   ❌ Eve read the message");
  }
}

quickTest();
