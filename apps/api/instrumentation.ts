// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { assertAppEnvReady } from "./src/lib/env";

export async function register() {
  assertAppEnvReady();
}
