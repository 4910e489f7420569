import Database from 'better-sqlite3';
import { CorpusUnavailableError } from './errors.js';
import { patternOf } from './pattern.js';
import { PatternIndex } from './patternIndex.js';
import type { IngestStats, Pattern, RankedWord, Word } from './types.js';

export interface CorpusStore{
  batchWords(entries:RankedWord[]):void; clear():void;
  wordsForPattern(pattern:Pattern):Word[]; allWords():Word[];
  count():number; patternCount():number; close():void; db:Database.Database;
}

export interface OpenStoreOptions { mustExist?: boolean; }

function prepareStatements(db:Database.Database){
  return {
    put:db.prepare('INSERT OR REPLACE INTO words(rank,word,pattern) VALUES(?,?,?)'),
    del:db.prepare('DELETE FROM words'),
    qP:db.prepare('SELECT word FROM words WHERE pattern = ? ORDER BY rank ASC'),
    qA:db.prepare('SELECT word FROM words ORDER BY rank ASC'),
    qC:db.prepare('SELECT COUNT(*) as c FROM words'),
    qU:db.prepare('SELECT COUNT(DISTINCT pattern) as u FROM words')
  };
}

function openDatabase(path:string,mustExist:boolean){
  let db:Database.Database|undefined;
  try {
    db=new Database(path,{fileMustExist:mustExist});
    if(path!==':memory:') db.pragma('journal_mode = WAL');
    db.exec(`CREATE TABLE IF NOT EXISTS words(rank INTEGER PRIMARY KEY, word TEXT NOT NULL, pattern TEXT NOT NULL);
             CREATE INDEX IF NOT EXISTS idx_words_pattern ON words(pattern, rank);`);
    return {db,...prepareStatements(db)};
  } catch(err){
    db?.close();
    throw new CorpusUnavailableError(path,err);
  }
}

/**
 * @throws CorpusUnavailableError when the file cannot be opened or holds a different schema
 */
export function openCorpusStore(path='corpus.db',opts:OpenStoreOptions={}):CorpusStore{
  const {db,put,del,qP,qA,qC,qU}=openDatabase(path,opts.mustExist??false);

  const insertAll=db.transaction((entries:RankedWord[])=>{
    for(const {rank,word} of entries) put.run(rank,word,patternOf(word));
  });

  return { db,
    batchWords(entries){insertAll(entries);},
    clear(){del.run();},
    wordsForPattern(p){return (qP.all(p) as {word:string}[]).map(r=>r.word);},
    allWords(){return (qA.all() as {word:string}[]).map(r=>r.word);},
    count(){const r=qC.get() as {c:number}; return r.c;},
    patternCount(){const r=qU.get() as {u:number}; return r.u;},
    close(){db.close();}
  };
}

/**
 * Replace the store contents with a frequency-ordered word list.
 * Ranks follow list position, so the stored order is the corpus order.
 */
export function ingestCorpus(words:Word[],dbPath='corpus.db'):IngestStats{
  const store=openCorpusStore(dbPath);
  try {
    const entries=words.map((word,i)=>({rank:i+1,word}));
    store.db.transaction(()=>{ store.clear(); store.batchWords(entries); })();
    return {words:store.count(),patterns:store.patternCount()};
  } finally {
    store.close();
  }
}

/**
 * @throws CorpusUnavailableError when the database is missing or is not a corpus store
 */
export function loadCorpusFromStore(dbPath='corpus.db'):PatternIndex{
  const store=openCorpusStore(dbPath,{mustExist:true});
  try {
    return PatternIndex.build(store.allWords());
  } finally {
    store.close();
  }
}
