// PatrolSync - Test Setup
// Installs an in-process IndexedDB for the record store tests

import 'fake-indexeddb/auto';
