import { PracticeBoard } from "@/components/organisms/PracticeBoard/PracticeBoard";
import styles from "./PracticeTemplate.module.css";

export type PracticeCopy = {
  title: string;
  lede: string;
};

export function PracticeTemplate({ copy }: { copy: PracticeCopy }) {
  return (
    <div>
      <header className={styles.header}>
        <h1 className={styles.title}>{copy.title}</h1>
        <p className={styles.lede}>{copy.lede}</p>
      </header>
      <PracticeBoard />
    </div>
  );
}
