type Props = {
  items: string[];
};

export function BulletList({ items }: Props) {
  if (!items.length) return <p className="muted">None reported</p>;

  return (
    <ul>
      {items.map((item, index) => (
        <li key={`${index}-${item}`}>{item}</li>
      ))}
    </ul>
  );
}
