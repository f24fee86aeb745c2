import { applicationDefault, cert, getApps, initializeApp, type ServiceAccount } from "firebase-admin/app";
import { getFirestore, type Firestore } from "firebase-admin/firestore";

let db: Firestore | null = null;

function loadCredential() {
  const raw = process.env.FIREBASE_SERVICE_ACCOUNT;
  if (!raw) return applicationDefault();

  let account: ServiceAccount;
  try {
    account = JSON.parse(raw);
  } catch (error) {
    throw new Error("FIREBASE_SERVICE_ACCOUNT is not valid JSON", { cause: error });
  }
  return cert(account);
}

export function getDb(): Firestore {
  if (!db) {
    const app = getApps()[0] ?? initializeApp({ credential: loadCredential() });
    db = getFirestore(app);
  }
  return db;
}
