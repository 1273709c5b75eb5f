export const QUERIES = {
  SELECT_ALL_STUDENTS: `
        SELECT student_id, first_name, last_name, email,
               enrollment_date::text AS enrollment_date
        FROM students
        ORDER BY student_id;
      `,
  INSERT_STUDENT: `
        INSERT INTO students (first_name, last_name, email, enrollment_date)
        VALUES ($1, $2, $3, $4)
        RETURNING student_id;
      `,
  UPDATE_STUDENT_EMAIL: `UPDATE students SET email = $1 WHERE student_id = $2;`,
  DELETE_STUDENT: `DELETE FROM students WHERE student_id = $1;`,
};
